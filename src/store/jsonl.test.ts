import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonlFileStore } from './jsonl';
import { StorageError } from '../util/errors';
import logger from '../util/logger';

jest.mock('../util/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

function readLines(file: string): string[] {
  return fs.readFileSync(file, 'utf8').split('\n').filter(line => line.length > 0);
}

describe('JsonlFileStore', () => {
  let dir: string;
  let destination: string;

  beforeEach(() => {
    jest.clearAllMocks();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'match-store-'));
    destination = path.join(dir, 'matches.jsonl');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create the destination and append one line per record', async () => {
    const store = await JsonlFileStore.open({ destination });

    await store.append({ matchId: 'EUW1_1', match: { gameDuration: 1800 } });
    await store.append({ matchId: 'EUW1_2', match: { gameDuration: 900 }, timeline: { frames: [] } });
    await store.close();

    expect(readLines(destination)).toEqual([
      '{"matchId":"EUW1_1","match":{"gameDuration":1800}}',
      '{"matchId":"EUW1_2","match":{"gameDuration":900},"timeline":{"frames":[]}}',
    ]);
  });

  it('should report appended records through contains', async () => {
    const store = await JsonlFileStore.open({ destination });

    expect(await store.contains('EUW1_1')).toBe(false);
    await store.append({ matchId: 'EUW1_1', match: {} });
    expect(await store.contains('EUW1_1')).toBe(true);
    expect(store.size).toBe(1);

    await store.close();
  });

  it('should start an empty store in append mode when the destination does not exist yet', async () => {
    expect(fs.existsSync(destination)).toBe(false);

    const store = await JsonlFileStore.open({ destination, append: true });
    expect(store.size).toBe(0);
    await store.close();

    expect(fs.readFileSync(destination, 'utf8')).toBe('');
  });

  it('should create missing parent directories', async () => {
    const nested = path.join(dir, 'a', 'b', 'matches.jsonl');
    const store = await JsonlFileStore.open({ destination: nested });
    await store.append({ matchId: 'NA1_7', match: {} });
    await store.close();

    expect(readLines(nested)).toEqual(['{"matchId":"NA1_7","match":{}}']);
  });

  it('should preload stored ids in append mode', async () => {
    fs.writeFileSync(destination, [
      '{"matchId":"EUW1_1","match":{}}',
      '',
      '{"matchId":"EUW1_2","match":{}}',
      '',
    ].join('\n'));

    const store = await JsonlFileStore.open({ destination, append: true });

    expect(store.size).toBe(2);
    expect(await store.contains('EUW1_1')).toBe(true);
    expect(await store.contains('EUW1_2')).toBe(true);
    expect(await store.contains('EUW1_3')).toBe(false);

    await store.append({ matchId: 'EUW1_3', match: {} });
    await store.close();

    expect(readLines(destination)).toEqual([
      '{"matchId":"EUW1_1","match":{}}',
      '{"matchId":"EUW1_2","match":{}}',
      '{"matchId":"EUW1_3","match":{}}',
    ]);
  });

  it('should keep ids across reopen', async () => {
    const first = await JsonlFileStore.open({ destination });
    await first.append({ matchId: 'KR_1', match: {} });
    await first.close();

    const second = await JsonlFileStore.open({ destination, append: true });
    expect(await second.contains('KR_1')).toBe(true);
    await second.close();
  });

  it('should start the next record on a new line when the file lacks a trailing newline', async () => {
    fs.writeFileSync(destination, '{"matchId":"EUW1_1","match":{}}');

    const store = await JsonlFileStore.open({ destination, append: true });
    await store.append({ matchId: 'EUW1_2', match: {} });
    await store.append({ matchId: 'EUW1_3', match: {} });
    await store.close();

    expect(fs.readFileSync(destination, 'utf8')).toBe(
      '{"matchId":"EUW1_1","match":{}}\n{"matchId":"EUW1_2","match":{}}\n{"matchId":"EUW1_3","match":{}}\n'
    );
  });

  it('should accept an existing empty file without append mode', async () => {
    fs.writeFileSync(destination, '');

    const store = await JsonlFileStore.open({ destination });
    expect(store.size).toBe(0);
    await store.close();
  });

  it('should refuse to reuse a non-empty file without append mode', async () => {
    fs.writeFileSync(destination, '{"matchId":"EUW1_1","match":{}}\n');

    const error = await JsonlFileStore.open({ destination }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ operation: 'open', destination, code: 'STORAGE' });
    expect(fs.readFileSync(destination, 'utf8')).toBe('{"matchId":"EUW1_1","match":{}}\n');
  });

  it('should fail preload on invalid JSON and name the line', async () => {
    fs.writeFileSync(destination, '{"matchId":"EUW1_1","match":{}}\n{"matchId":"EUW1_2","ma\n');

    const error = await JsonlFileStore.open({ destination, append: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ operation: 'preload', line: 2 });
  });

  it('should drop a record cut off before its newline and resume after the last complete line', async () => {
    const complete = '{"matchId":"EUW1_1","match":{}}\n';
    const cutOff = `{"matchId":"EUW1_2","match":{"frames":"${'x'.repeat(200 * 1024)}`;
    fs.writeFileSync(destination, complete + cutOff);

    const store = await JsonlFileStore.open({ destination, append: true });

    expect(store.size).toBe(1);
    expect(await store.contains('EUW1_2')).toBe(false);
    expect(fs.readFileSync(destination, 'utf8')).toBe(complete);
    expect(logger.warn).toHaveBeenCalledWith(
      `Dropping incomplete last record (${Buffer.byteLength(cutOff)} bytes) from ${destination}`
    );

    await store.append({ matchId: 'EUW1_2', match: {} });
    await store.close();

    expect(fs.readFileSync(destination, 'utf8')).toBe(complete + '{"matchId":"EUW1_2","match":{}}\n');
  });

  it('should empty a file whose only record was cut off', async () => {
    fs.writeFileSync(destination, '{"matchId":"EUW1_1","ma');

    const store = await JsonlFileStore.open({ destination, append: true });
    await store.append({ matchId: 'EUW1_1', match: {} });
    await store.close();

    expect(fs.readFileSync(destination, 'utf8')).toBe('{"matchId":"EUW1_1","match":{}}\n');
  });

  it('should fail preload on a record without a matchId', async () => {
    fs.writeFileSync(destination, '{"gameId":42}\n');

    const error = await JsonlFileStore.open({ destination, append: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ operation: 'preload', line: 1 });
  });

  it('should fail with StorageError when the destination cannot be opened', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, '');

    const error = await JsonlFileStore.open({ destination: path.join(blocker, 'matches.jsonl'), append: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ operation: 'open' });
  });

  it('should reject appends after close', async () => {
    const store = await JsonlFileStore.open({ destination });
    await store.close();
    await store.close();

    await expect(store.append({ matchId: 'EUW1_1', match: {} })).rejects.toMatchObject({ operation: 'append' });
  });
});
