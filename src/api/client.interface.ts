export type MatchId = string;

/** Opaque JSON document returned by the remote API, stored verbatim. */
export type MatchPayload = Record<string, unknown>;

interface MatchListingClient {
    /** Ids requested per listing page; a shorter page is the last one. */
    readonly pageSize: number;

    /**
     * Returns one page of the player's match ids, in whatever order the
     * remote API lists them. Pages are numbered from 0. An empty array means
     * the listing is exhausted.
     *
     * @throws FetchError once the client's own retries are spent
     */
    listPage(puuid: string, page: number): Promise<MatchId[]>;

    getDetail(matchId: MatchId): Promise<MatchPayload>;

    getTimeline(matchId: MatchId): Promise<MatchPayload>;
}

export default MatchListingClient;
