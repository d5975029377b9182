import { MatchId, MatchPayload } from '../api/client.interface';

export interface MatchRecord {
    matchId: MatchId;
    match: MatchPayload;
    /** Present only when the scrape was asked to fetch timelines. */
    timeline?: MatchPayload;
}

interface MatchStore {
    /**
     * Whether a record with this id is already durably stored, by this
     * session or an earlier one.
     */
    contains(matchId: MatchId): Promise<boolean>;

    /**
     * Durably persists one record before resolving. Appending an id that is
     * already stored is not supported; check `contains` first.
     *
     * @throws StorageError if the record could not be written
     */
    append(record: MatchRecord): Promise<void>;

    close(): Promise<void>;
}

export default MatchStore;
