// Riot routing: match-v5 lives on regional hosts, keyed by the player's platform.
export type RegionalRoute = 'americas' | 'europe' | 'asia' | 'sea';

export const PLATFORM_ROUTES: Record<string, RegionalRoute> = {
    na1: 'americas',
    br1: 'americas',
    la1: 'americas',
    la2: 'americas',
    euw1: 'europe',
    eun1: 'europe',
    tr1: 'europe',
    ru: 'europe',
    me1: 'europe',
    kr: 'asia',
    jp1: 'asia',
    oc1: 'sea',
    ph2: 'sea',
    sg2: 'sea',
    th2: 'sea',
    tw2: 'sea',
    vn2: 'sea',
};

// Short names players commonly type for a platform.
export const PLATFORM_ALIASES: Record<string, string> = {
    na: 'na1',
    br: 'br1',
    lan: 'la1',
    las: 'la2',
    euw: 'euw1',
    eune: 'eun1',
    tr: 'tr1',
    me: 'me1',
    jp: 'jp1',
    oce: 'oc1',
    ph: 'ph2',
    sg: 'sg2',
    th: 'th2',
    tw: 'tw2',
    vn: 'vn2',
};

export const RIOT_API_HOST = 'api.riotgames.com';

/** match-v5 caps `count` on the ids endpoint at 100. */
export const MAX_PAGE_SIZE = 100;
