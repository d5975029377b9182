import { listAllMatchIds } from './pagination';
import { FetchError } from '../util/errors';
import { FakeListingClient } from '../../tests/helpers/fakeListingClient';

jest.mock('../util/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

async function collect(ids: AsyncIterable<string>): Promise<string[]> {
  const result: string[] = [];
  for await (const id of ids) {
    result.push(id);
  }
  return result;
}

describe('listAllMatchIds', () => {
  it('should yield ids in listing order and stop after a short page', async () => {
    const client = new FakeListingClient([['m1', 'm2'], ['m3'], []], 2);

    await expect(collect(listAllMatchIds(client, 'puuid-1'))).resolves.toEqual(['m1', 'm2', 'm3']);
    expect(client.listed).toEqual([0, 1]);
  });

  it('should stop on an empty page when every page is full', async () => {
    const client = new FakeListingClient([['a', 'b'], ['c', 'd'], []], 2);

    await expect(collect(listAllMatchIds(client, 'puuid-1'))).resolves.toEqual(['a', 'b', 'c', 'd']);
    expect(client.listed).toEqual([0, 1, 2]);
  });

  it('should keep the order the listing returns, even when unsorted', async () => {
    const client = new FakeListingClient([['z', 'a', 'm']], 5);

    await expect(collect(listAllMatchIds(client, 'puuid-1'))).resolves.toEqual(['z', 'a', 'm']);
  });

  it('should request the next page only when the consumer needs it', async () => {
    const client = new FakeListingClient([['a', 'b'], ['c']], 2);
    const ids = listAllMatchIds(client, 'puuid-1');

    expect(client.listed).toEqual([]);
    await ids.next();
    expect(client.listed).toEqual([0]);
    await ids.next();
    expect(client.listed).toEqual([0]);
    await expect(ids.next()).resolves.toEqual({ value: 'c', done: false });
    expect(client.listed).toEqual([0, 1]);
  });

  it('should start from the first page on every call', async () => {
    const client = new FakeListingClient([['a', 'b'], ['c']], 2);

    await collect(listAllMatchIds(client, 'puuid-1'));
    await collect(listAllMatchIds(client, 'puuid-1'));

    expect(client.listed).toEqual([0, 1, 0, 1]);
  });

  it('should report each page and stop when onPage returns false', async () => {
    const client = new FakeListingClient([['a', 'b'], ['c', 'd'], ['e']], 2);
    const pages: Array<{ page: number; count: number }> = [];

    const ids = await collect(listAllMatchIds(client, 'puuid-1', {
      onPage: (info) => {
        pages.push(info);
        return info.page < 1;
      },
    }));

    expect(ids).toEqual(['a', 'b']);
    expect(pages).toEqual([{ page: 0, count: 2 }, { page: 1, count: 2 }]);
    expect(client.listed).toEqual([0, 1]);
  });

  it('should surface listing failures as FetchError', async () => {
    const client = new FakeListingClient([['a', 'b'], ['c']], 2, { listingPage: 1 });
    const seen: string[] = [];

    const error = await (async () => {
      for await (const id of listAllMatchIds(client, 'puuid-1')) {
        seen.push(id);
      }
    })().catch((e: unknown) => e);

    expect(seen).toEqual(['a', 'b']);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      stage: 'listing',
      page: 1,
      message: 'listing fetch failed for page 1: listing unavailable',
    });
  });
});
