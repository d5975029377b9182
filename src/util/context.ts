import { AsyncLocalStorage } from 'async_hooks';

interface SessionContext {
    sessionId?: string;
}

export const sessionContext = new AsyncLocalStorage<SessionContext>();

export function getSessionId(): string | undefined {
    const store = sessionContext.getStore();
    return store?.sessionId;
}

export function runWithSessionId<T>(sessionId: string, callback: () => T): T {
    return sessionContext.run({ sessionId }, callback);
}

export function createSessionId(): string {
    return Math.random().toString(36).substring(2, 8);
}
