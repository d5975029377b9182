import logger from '../util/logger';
import { createSessionId, runWithSessionId } from '../util/context';
import { defaultRiotSettings, RiotSettings } from '../util/config';
import { ListingFilter, parseRiotId, RiotClient } from '../api/riot';
import MatchStore from '../store/store.interface';
import { processMatches, ProcessSummary, ProgressHook } from './orchestrator';

export { listAllMatchIds } from './pagination';
export type { PageInfo, PaginationOptions } from './pagination';
export { processMatches } from './orchestrator';
export type { ProcessOptions, ProcessSummary, ProgressEvent, ProgressHook } from './orchestrator';

export interface ScrapeOptions {
    withTimeline?: boolean;
    filter?: ListingFilter;
    onProgress?: ProgressHook;
    /** Rate limit, retry and page size settings for the Riot client. */
    settings?: RiotSettings;
}

export interface ScrapeSummary extends ProcessSummary {
    puuid: string;
    riotId: string;
}

/**
 * Scrapes every match of `player` (a Riot ID, `gameName#tagLine`) into
 * `store`. The Riot client is created for this call alone.
 *
 * The store is the only state: killing the process at any point and running
 * the same scrape again against an append-mode store picks up where the last
 * completed append left off.
 */
export async function scrape(
    store: MatchStore,
    apiKey: string,
    region: string,
    player: string,
    options: ScrapeOptions = {}
): Promise<ScrapeSummary> {
    const riotId = parseRiotId(player);
    const client = new RiotClient({
        apiKey,
        region,
        settings: options.settings ?? defaultRiotSettings,
        filter: options.filter,
    });

    return runWithSessionId(createSessionId(), async () => {
        logger.info(`Scraping matches of ${riotId.gameName}#${riotId.tagLine} on ${client.routing.platform}`);

        const account = await client.resolvePlayer(riotId);
        logger.debug(`Resolved ${account.gameName}#${account.tagLine} to ${account.puuid}`);

        const summary = await processMatches(store, client, account.puuid, {
            withTimeline: options.withTimeline ?? false,
            onProgress: options.onProgress,
        });

        return { ...summary, puuid: account.puuid, riotId: `${account.gameName}#${account.tagLine}` };
    });
}
