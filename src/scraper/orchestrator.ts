import logger from '../util/logger';
import { FetchError } from '../util/errors';
import MatchListingClient, { MatchId, MatchPayload } from '../api/client.interface';
import MatchStore, { MatchRecord } from '../store/store.interface';
import { listAllMatchIds } from './pagination';

export type ProgressEvent =
    | { type: 'page'; page: number; count: number }
    | { type: 'match'; matchId: MatchId; index: number; stored: number };

/** Returning exactly `false` stops the scrape before the next fetch. */
export type ProgressHook = (event: ProgressEvent) => boolean | void;

export interface ProcessOptions {
    withTimeline?: boolean;
    onProgress?: ProgressHook;
}

export interface ProcessSummary {
    /** False when a progress hook stopped the run early. */
    completed: boolean;
    pages: number;
    listed: number;
    skipped: number;
    stored: number;
}

async function fetchRecord(client: MatchListingClient, matchId: MatchId, withTimeline: boolean): Promise<MatchRecord> {
    let match: MatchPayload;
    try {
        match = await client.getDetail(matchId);
    } catch (error) {
        throw FetchError.wrap(error, { stage: 'detail', matchId });
    }

    if (!withTimeline) {
        return { matchId, match };
    }

    let timeline: MatchPayload;
    try {
        timeline = await client.getTimeline(matchId);
    } catch (error) {
        throw FetchError.wrap(error, { stage: 'timeline', matchId });
    }

    return { matchId, match, timeline };
}

/**
 * Stores every listed match the store does not have yet, one at a time and
 * in listing order. Each record is appended before the next id is looked at,
 * so whatever has been stored when the process stops is skipped on the next
 * run. Any fetch or storage failure ends the run.
 */
export async function processMatches(
    store: MatchStore,
    client: MatchListingClient,
    puuid: string,
    options: ProcessOptions = {}
): Promise<ProcessSummary> {
    const { withTimeline = false, onProgress } = options;
    const summary: ProcessSummary = { completed: true, pages: 0, listed: 0, skipped: 0, stored: 0 };

    const matchIds = listAllMatchIds(client, puuid, {
        onPage: ({ page, count }) => {
            summary.pages++;
            logger.info(`Found ${count} matches on page ${page + 1}`);
            if (onProgress?.({ type: 'page', page, count }) === false) {
                summary.completed = false;
                return false;
            }
        },
    });

    for await (const matchId of matchIds) {
        summary.listed++;

        if (await store.contains(matchId)) {
            summary.skipped++;
            continue;
        }

        if (onProgress?.({ type: 'match', matchId, index: summary.listed, stored: summary.stored }) === false) {
            summary.completed = false;
            break;
        }

        logger.debug(`Downloading match ${matchId} (${summary.listed} listed so far)`);
        const record = await fetchRecord(client, matchId, withTimeline);
        await store.append(record);
        summary.stored++;
    }

    if (!summary.completed) {
        logger.warn(`Scrape stopped early: ${summary.stored} new matches stored, ${summary.skipped} already present.`);
    } else {
        logger.info(`Scrape complete: ${summary.stored} new matches stored, ${summary.skipped} already present.`);
    }

    return summary;
}
