import { MatchId } from '../api/client.interface';
import MatchStore, { MatchRecord } from './store.interface';

/** Keeps records in process memory. Nothing survives a restart. */
export class MemoryStore implements MatchStore {
    readonly records: MatchRecord[] = [];
    private readonly matchIds = new Set<MatchId>();

    constructor(initial: MatchRecord[] = []) {
        initial.forEach(record => {
            this.records.push(record);
            this.matchIds.add(record.matchId);
        });
    }

    async contains(matchId: MatchId): Promise<boolean> {
        return this.matchIds.has(matchId);
    }

    async append(record: MatchRecord): Promise<void> {
        this.records.push(record);
        this.matchIds.add(record.matchId);
    }

    async close(): Promise<void> { }
}
