import { appendFileSync, copyFileSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import handler, { type BooksResponse } from '../../api/books.js';
import { resetDataset } from '../../api/data.js';
import facetsHandler, { type FacetsResponse } from '../../api/facets.js';
import { createMockRequest, createMockResponse } from './testing.js';

// In-memory stand-in for Redis
const store = vi.hoisted(() => new Map<string, string>());

vi.mock('../../api/redis.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../api/redis.js')>();
  return {
    ...actual,
    getCached: async (key: string) => {
      const json = store.get(key);
      return json ? JSON.parse(json) : null;
    },
    setCached: async (key: string, value: unknown) => {
      store.set(key, JSON.stringify(value));
      return true;
    },
  };
});

const FIXTURES = fileURLToPath(new URL('../fixtures', import.meta.url));

const books = async () => {
  const { res, result } = createMockResponse();
  await handler(createMockRequest('GET'), res);
  return result.body as BooksResponse;
};

const facets = async () => {
  const { res, result } = createMockResponse();
  await facetsHandler(createMockRequest('GET'), res);
  return result.body as FacetsResponse;
};

const bookKeys = () => Array.from(store.keys()).filter((key) => key.startsWith('books:v2:'));

describe('response cache', () => {
  let dataDir: string;

  beforeAll(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'reading-list-'));
    for (const file of readdirSync(FIXTURES)) {
      copyFileSync(join(FIXTURES, file), join(dataDir, file));
    }
    vi.stubEnv('DATA_DIR', dataDir);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  beforeEach(() => {
    store.clear();
    resetDataset();
  });

  afterAll(() => {
    rmSync(dataDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('answers repeat queries from the cache', async () => {
    expect((await books()).total).toBe(5);
    expect(bookKeys()).toHaveLength(1);

    const [key] = bookKeys();
    store.set(key, JSON.stringify({ ...(await books()), total: 99 }));
    expect((await books()).total).toBe(99);
  });

  it('stops serving cached responses once the data files change', async () => {
    expect((await books()).total).toBe(5);
    expect((await facets()).stats.totalBooks).toBe(5);

    appendFileSync(join(dataDir, 'goodreads_works.csv'), '6,New Arrival,Eve Stone,fantasy,4.5,10,1,2020,200,,,\n');
    // A fresh function instance reads the new files
    resetDataset();

    expect((await books()).total).toBe(6);
    expect((await facets()).stats.totalBooks).toBe(6);
    expect(bookKeys()).toHaveLength(2);
  });
});
