export type ErrorCode = 'STORAGE' | 'FETCH';

export class ScrapeError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ScrapeError';
        this.code = code;
    }
}

export type StorageOperation = 'open' | 'preload' | 'append' | 'close';

export interface StorageErrorContext {
    operation: StorageOperation;
    destination: string;
    /** 1-based line of the stored file, for preload failures. */
    line?: number;
    cause?: unknown;
}

export class StorageError extends ScrapeError {
    readonly operation: StorageOperation;
    readonly destination: string;
    readonly line?: number;

    constructor(message: string, context: StorageErrorContext) {
        super('STORAGE', message, { cause: context.cause });
        this.name = 'StorageError';
        this.operation = context.operation;
        this.destination = context.destination;
        this.line = context.line;
    }
}

export type FetchStage = 'account' | 'listing' | 'detail' | 'timeline';

export interface FetchErrorContext {
    stage: FetchStage;
    matchId?: string;
    page?: number;
    status?: number;
    cause?: unknown;
}

export class FetchError extends ScrapeError {
    readonly stage: FetchStage;
    readonly matchId?: string;
    readonly page?: number;
    readonly status?: number;

    constructor(message: string, context: FetchErrorContext) {
        super('FETCH', message, { cause: context.cause });
        this.name = 'FetchError';
        this.stage = context.stage;
        this.matchId = context.matchId;
        this.page = context.page;
        this.status = context.status;
    }

    /**
     * Surfaces a client failure as a FetchError. Errors that already are one
     * pass through so the innermost stage is kept.
     */
    static wrap(error: unknown, context: Omit<FetchErrorContext, 'cause'>): FetchError {
        if (error instanceof FetchError) return error;

        const reason = error instanceof Error ? error.message : String(error);
        const subject = context.matchId ?? (context.page !== undefined ? `page ${context.page}` : undefined);
        const message = subject
            ? `${context.stage} fetch failed for ${subject}: ${reason}`
            : `${context.stage} fetch failed: ${reason}`;
        return new FetchError(message, { ...context, cause: error });
    }
}

export function describeError(error: unknown): Record<string, unknown> {
    if (error instanceof FetchError) {
        return { stage: error.stage, matchId: error.matchId, page: error.page, status: error.status };
    }
    if (error instanceof StorageError) {
        return { operation: error.operation, destination: error.destination, line: error.line };
    }
    return {};
}
