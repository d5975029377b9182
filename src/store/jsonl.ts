import fs from 'fs';
import { FileHandle, mkdir, open, stat } from 'fs/promises';
import path from 'path';
import readline from 'readline';
import { z } from 'zod';
import logger from '../util/logger';
import { StorageError } from '../util/errors';
import { MatchId } from '../api/client.interface';
import MatchStore, { MatchRecord } from './store.interface';

export interface FileStoreOptions {
    destination: string;
    /**
     * Reuse an existing file and index the matches already in it. Without
     * it the destination must be missing or empty.
     */
    append?: boolean;
}

const StoredRecordSchema = z.object({
    matchId: z.string().min(1),
});

const NEWLINE = 0x0a;
const SCAN_CHUNK_SIZE = 64 * 1024;

// fs errors come from Node's own realm, so `instanceof Error` is not reliable.
function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function reason(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

function isJson(text: string): boolean {
    try {
        JSON.parse(text);
        return true;
    } catch {
        return false;
    }
}

/** Byte offset of the last newline before `size`, or -1 if there is none. */
async function findLastNewline(handle: FileHandle, size: number): Promise<number> {
    const chunk = Buffer.alloc(SCAN_CHUNK_SIZE);
    let end = size;
    while (end > 0) {
        const start = Math.max(0, end - chunk.length);
        const { bytesRead } = await handle.read(chunk, 0, end - start, start);
        const index = chunk.subarray(0, bytesRead).lastIndexOf(NEWLINE);
        if (index !== -1) return start + index;
        end = start;
    }
    return -1;
}

/**
 * Stores one match per line as JSON. Each append writes one complete line
 * followed by a data sync. A record cut off by a kill mid-append is dropped
 * when the file is next opened in append mode.
 */
export class JsonlFileStore implements MatchStore {
    private readonly matchIds = new Set<MatchId>();
    private handle: FileHandle | null = null;
    private needsLeadingNewline = false;

    private constructor(readonly destination: string) { }

    static async open(options: FileStoreOptions): Promise<JsonlFileStore> {
        const store = new JsonlFileStore(options.destination);
        await store.initialize(options.append ?? false);
        return store;
    }

    get size(): number {
        return this.matchIds.size;
    }

    async contains(matchId: MatchId): Promise<boolean> {
        return this.matchIds.has(matchId);
    }

    async append(record: MatchRecord): Promise<void> {
        if (!this.handle) {
            throw new StorageError(`Cannot append ${record.matchId}: ${this.destination} is closed`, {
                operation: 'append',
                destination: this.destination,
            });
        }

        const prefix = this.needsLeadingNewline ? '\n' : '';
        const line = `${prefix}${JSON.stringify(record)}\n`;

        try {
            await this.handle.appendFile(line, 'utf8');
            await this.handle.datasync();
        } catch (error) {
            throw new StorageError(`Failed to append ${record.matchId} to ${this.destination}: ${reason(error)}`, {
                operation: 'append',
                destination: this.destination,
                cause: error,
            });
        }

        this.needsLeadingNewline = false;
        this.matchIds.add(record.matchId);
    }

    async close(): Promise<void> {
        const handle = this.handle;
        if (!handle) return;
        this.handle = null;

        try {
            await handle.close();
        } catch (error) {
            throw new StorageError(`Failed to close ${this.destination}: ${reason(error)}`, {
                operation: 'close',
                destination: this.destination,
                cause: error,
            });
        }
    }

    private async initialize(append: boolean): Promise<void> {
        let existingSize = 0;
        try {
            existingSize = (await stat(this.destination)).size;
        } catch (error) {
            if (!isNotFound(error)) {
                throw new StorageError(`Cannot access ${this.destination}: ${reason(error)}`, {
                    operation: 'open',
                    destination: this.destination,
                    cause: error,
                });
            }
        }

        if (existingSize > 0 && !append) {
            throw new StorageError(`${this.destination} already contains data; use append mode to extend it`, {
                operation: 'open',
                destination: this.destination,
            });
        }

        if (existingSize > 0) {
            await this.preload(existingSize);
        }

        try {
            await mkdir(path.dirname(this.destination), { recursive: true });
            this.handle = await open(this.destination, 'a');
        } catch (error) {
            throw new StorageError(`Cannot open ${this.destination}: ${reason(error)}`, {
                operation: 'open',
                destination: this.destination,
                cause: error,
            });
        }
    }

    /**
     * Indexes every stored match id. This single scan is what lets a new
     * session skip matches stored by an earlier one.
     */
    private async preload(existingSize: number): Promise<void> {
        logger.info(`Reading existing matches from ${this.destination}...`);

        let lineNumber = 0;
        try {
            const size = await this.dropIncompleteTail(existingSize);

            const lines = readline.createInterface({
                input: fs.createReadStream(this.destination, { encoding: 'utf8' }),
                crlfDelay: Infinity,
            });

            for await (const rawLine of lines) {
                lineNumber++;
                const line = rawLine.trim();
                if (!line) continue;

                let parsed: unknown;
                try {
                    parsed = JSON.parse(line);
                } catch (error) {
                    throw new StorageError(`Invalid JSON at line ${lineNumber} of ${this.destination}: ${reason(error)}`, {
                        operation: 'preload',
                        destination: this.destination,
                        line: lineNumber,
                        cause: error,
                    });
                }

                const result = StoredRecordSchema.safeParse(parsed);
                if (!result.success) {
                    throw new StorageError(`Missing matchId at line ${lineNumber} of ${this.destination}`, {
                        operation: 'preload',
                        destination: this.destination,
                        line: lineNumber,
                    });
                }
                this.matchIds.add(result.data.matchId);
            }

            this.needsLeadingNewline = size > 0 && !(await this.endsWithNewline(size));
        } catch (error) {
            if (error instanceof StorageError) throw error;
            throw new StorageError(`Failed to read ${this.destination}: ${reason(error)}`, {
                operation: 'preload',
                destination: this.destination,
                cause: error,
            });
        }

        logger.info(`Found ${this.matchIds.size} stored matches in ${this.destination}`);
    }

    /**
     * A final line without a newline that is not valid JSON is an append the
     * process never finished. It is cut off so the file can be resumed.
     * Returns the size of the file afterwards.
     */
    private async dropIncompleteTail(size: number): Promise<number> {
        if (await this.endsWithNewline(size)) return size;

        const handle = await open(this.destination, 'r+');
        try {
            const tailStart = (await findLastNewline(handle, size)) + 1;
            const tail = Buffer.alloc(size - tailStart);
            await handle.read(tail, 0, tail.length, tailStart);

            const text = tail.toString('utf8').trim();
            if (!text || isJson(text)) return size;

            logger.warn(`Dropping incomplete last record (${size - tailStart} bytes) from ${this.destination}`);
            await handle.truncate(tailStart);
            await handle.datasync();
            return tailStart;
        } finally {
            await handle.close();
        }
    }

    private async endsWithNewline(size: number): Promise<boolean> {
        const handle = await open(this.destination, 'r');
        try {
            const { bytesRead, buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
            return bytesRead === 1 && buffer[0] === NEWLINE;
        } finally {
            await handle.close();
        }
    }
}
