import Axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import logger from '../util/logger';
import { retryOperation } from '../util/retry';
import { createLimiter, createRateLimitedAxios, RateLimitedAxios } from '../util/queues';
import { FetchError, FetchErrorContext } from '../util/errors';
import { PLATFORM_ALIASES, PLATFORM_ROUTES, RegionalRoute, RIOT_API_HOST } from '../util/constants';
import type { RiotSettings } from '../util/config';
import MatchListingClient, { MatchId, MatchPayload } from './client.interface';

export interface RiotId {
    gameName: string;
    tagLine: string;
}

export interface RiotAccount extends RiotId {
    puuid: string;
}

export interface Routing {
    platform: string;
    regional: RegionalRoute;
    /** account-v1 has no `sea` host; those platforms resolve through `asia`. */
    account: Exclude<RegionalRoute, 'sea'>;
}

/** Optional narrowing of the match listing, passed through as query params. */
export interface ListingFilter {
    queue?: number;
    type?: string;
    /** Epoch seconds. */
    startTime?: number;
    /** Epoch seconds. */
    endTime?: number;
}

export interface RiotClientOptions {
    apiKey: string;
    region: string;
    settings: RiotSettings;
    filter?: ListingFilter;
}

const AccountSchema = z.object({
    puuid: z.string().min(1),
    gameName: z.string().optional(),
    tagLine: z.string().optional(),
});

const MatchIdsSchema = z.array(z.string());

const PayloadSchema = z.record(z.unknown());

export function resolveRouting(region: string): Routing {
    const key = region.trim().toLowerCase();
    const platform = PLATFORM_ALIASES[key] ?? key;
    const regional = PLATFORM_ROUTES[platform];

    if (!regional) {
        throw new Error(`Unknown region: ${region}`);
    }

    return { platform, regional, account: regional === 'sea' ? 'asia' : regional };
}

export function parseRiotId(value: string): RiotId {
    const separator = value.lastIndexOf('#');
    const gameName = value.slice(0, separator).trim();
    const tagLine = value.slice(separator + 1).trim();

    if (separator === -1 || !gameName || !tagLine) {
        throw new Error(`Invalid Riot ID: "${value}". Expected format: gameName#tagLine`);
    }

    return { gameName, tagLine };
}

function statusOf(error: unknown): number | undefined {
    return isAxiosError(error) ? error.response?.status : undefined;
}

// Rate limits, server errors and dropped connections are worth another try.
function isTransient(error: unknown): boolean {
    if (!isAxiosError(error)) return false;
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
}

function retryAfterMs(error: unknown): number | undefined {
    if (!isAxiosError(error)) return undefined;
    const response = error.response;
    if (!response || response.status !== 429) return undefined;

    const header: unknown = response.headers['retry-after'];
    if (typeof header !== 'string' && typeof header !== 'number') return undefined;

    const seconds = Number(header);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class RiotClient implements MatchListingClient {
    readonly pageSize: number;
    readonly routing: Routing;
    private readonly http: RateLimitedAxios;

    constructor(
        private readonly options: RiotClientOptions,
        deps: { axios?: AxiosInstance; limiter?: Bottleneck } = {}
    ) {
        this.routing = resolveRouting(options.region);
        this.pageSize = options.settings.pageSize;

        const axios = deps.axios ?? Axios.create({
            headers: { 'X-Riot-Token': options.apiKey },
            timeout: options.settings.requestTimeoutMs,
        });
        const limiter = deps.limiter ?? createLimiter(options.settings.rateLimit, 'Riot');
        this.http = createRateLimitedAxios(axios, limiter, 'Riot');
    }

    async resolvePlayer(riotId: RiotId): Promise<RiotAccount> {
        const url = `${this.baseUrl(this.routing.account)}/riot/account/v1/accounts/by-riot-id/`
            + `${encodeURIComponent(riotId.gameName)}/${encodeURIComponent(riotId.tagLine)}`;

        try {
            const account = await this.get(url, AccountSchema, { stage: 'account' });
            return {
                puuid: account.puuid,
                gameName: account.gameName ?? riotId.gameName,
                tagLine: account.tagLine ?? riotId.tagLine,
            };
        } catch (error) {
            if (error instanceof FetchError && error.status === 404) {
                throw new FetchError(`No Riot account found for ${riotId.gameName}#${riotId.tagLine}`, {
                    stage: 'account',
                    status: 404,
                    cause: error,
                });
            }
            throw error;
        }
    }

    async listPage(puuid: string, page: number): Promise<MatchId[]> {
        const url = `${this.baseUrl(this.routing.regional)}/lol/match/v5/matches/by-puuid/${encodeURIComponent(puuid)}/ids`;
        const params = {
            start: page * this.pageSize,
            count: this.pageSize,
            ...this.options.filter,
        };

        try {
            return await this.get(url, MatchIdsSchema, { stage: 'listing', page }, { params });
        } catch (error) {
            // The listing answers 404 when nothing matches.
            if (error instanceof FetchError && error.status === 404) {
                logger.debug(`Listing page ${page} not found, treating as empty`);
                return [];
            }
            throw error;
        }
    }

    async getDetail(matchId: MatchId): Promise<MatchPayload> {
        const url = `${this.baseUrl(this.routing.regional)}/lol/match/v5/matches/${encodeURIComponent(matchId)}`;
        return this.get(url, PayloadSchema, { stage: 'detail', matchId });
    }

    async getTimeline(matchId: MatchId): Promise<MatchPayload> {
        const url = `${this.baseUrl(this.routing.regional)}/lol/match/v5/matches/${encodeURIComponent(matchId)}/timeline`;

        try {
            return await this.get(url, PayloadSchema, { stage: 'timeline', matchId });
        } catch (error) {
            // Some matches (e.g. remakes, old custom games) have no timeline.
            if (error instanceof FetchError && error.status === 404) {
                logger.debug(`No timeline available for ${matchId}`);
                return {};
            }
            throw error;
        }
    }

    private baseUrl(route: RegionalRoute): string {
        return `https://${route}.${RIOT_API_HOST}`;
    }

    private async get<T>(
        url: string,
        schema: z.ZodType<T>,
        context: Omit<FetchErrorContext, 'cause' | 'status'>,
        config?: AxiosRequestConfig
    ): Promise<T> {
        const { retries, retryDelayMs } = this.options.settings;
        const name = context.matchId ? `fetch ${context.stage} of ${context.matchId}` : `fetch ${context.stage}`;

        let response: AxiosResponse<unknown>;
        try {
            response = await retryOperation(() => this.http.get<unknown>(url, config), name, {
                retries,
                delay: retryDelayMs,
                shouldRetry: isTransient,
                delayFor: retryAfterMs,
            });
        } catch (error) {
            throw FetchError.wrap(error, { ...context, status: statusOf(error) });
        }

        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
            throw new FetchError(`Unexpected ${context.stage} response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, context);
        }
        return parsed.data;
    }
}
