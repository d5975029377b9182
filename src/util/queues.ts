import Bottleneck from 'bottleneck';
import { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from './logger';
import type { RateLimitSettings } from './config';

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * Creates a limiter for one API key. The reservoir models the key's long
 * window (e.g. 100 requests per 2 minutes); `minTime` spaces the short one.
 */
export function createLimiter(settings: RateLimitSettings, serviceName: string): Bottleneck {
    const limiter = new Bottleneck({
        maxConcurrent: settings.maxConcurrent,
        minTime: settings.minTime,
        reservoir: settings.reservoir,
        reservoirRefreshAmount: settings.reservoir,
        reservoirRefreshInterval: settings.reservoir === null ? null : settings.reservoirRefreshIntervalMs,
    });

    limiter.on('error', (err) => {
        logger.error({ err }, `[${serviceName} Limiter] Unhandled error in queue`);
    });

    // Don't retry within Bottleneck, retry logic is in retryOperation
    limiter.on('failed', (err: Error) => {
        logger.debug(`[${serviceName}] Job failed: ${err.message}`);
        return null;
    });

    limiter.on('depleted', () => {
        logger.info(`[${serviceName}] Rate limit reservoir exhausted, waiting for refresh...`);
    });

    return limiter;
}

// ============================================================================
// RATE-LIMITED AXIOS
// ============================================================================

export interface RateLimitedAxios {
    get: <T = unknown>(url: string, config?: AxiosRequestConfig) => Promise<AxiosResponse<T>>;
}

/**
 * Wraps an axios instance so that every call is queued through the limiter.
 */
export function createRateLimitedAxios(
    baseAxios: AxiosInstance,
    limiter: Bottleneck,
    serviceName: string
): RateLimitedAxios {
    return {
        get: <T = unknown>(url: string, config?: AxiosRequestConfig) => {
            logger.debug(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => baseAxios.get<T>(url, config));
        },
    };
}
