import logger from '../util/logger';
import { FetchError } from '../util/errors';
import MatchListingClient, { MatchId } from '../api/client.interface';

export interface PageInfo {
    /** 0-based page index. */
    page: number;
    count: number;
}

export interface PaginationOptions {
    /** Called once per page before its ids are yielded. Return false to stop listing. */
    onPage?: (info: PageInfo) => boolean | void;
}

/**
 * Lazily walks the player's match listing from the first page. The next page
 * is requested only once every id of the previous one has been consumed, and
 * the listing ends after the first page shorter than `client.pageSize`.
 *
 * Holds no state worth keeping: abandoning the iterator needs no cleanup, and
 * every call starts over at page 0.
 */
export async function* listAllMatchIds(
    client: MatchListingClient,
    puuid: string,
    options: PaginationOptions = {}
): AsyncGenerator<MatchId, void, undefined> {
    let page = 0;

    while (true) {
        logger.debug(`Fetching listing page ${page + 1}`);

        let matchIds: MatchId[];
        try {
            matchIds = await client.listPage(puuid, page);
        } catch (error) {
            throw FetchError.wrap(error, { stage: 'listing', page });
        }

        if (options.onPage?.({ page, count: matchIds.length }) === false) {
            return;
        }

        yield* matchIds;

        if (matchIds.length < client.pageSize) {
            return;
        }
        page++;
    }
}
