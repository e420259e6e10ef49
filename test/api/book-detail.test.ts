import { fileURLToPath } from 'url';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { resetDataset } from '../../api/data.js';
import { createMockRequest, createMockResponse } from './testing.js';
import handler, { type BookDetailResponse } from '../../api/books/[id].js';

const call = async (query: Record<string, string>) => {
  const { res, result } = createMockResponse();
  await handler(createMockRequest('GET', query), res);
  return result;
};

describe('GET /api/books/:id', () => {
  beforeAll(() => {
    vi.stubEnv('DATA_DIR', fileURLToPath(new URL('../fixtures', import.meta.url)));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    resetDataset();
  });

  afterAll(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('returns the book with spoiler-free reviews and similar books', async () => {
    const result = await call({ id: '1' });
    const body = result.body as BookDetailResponse;

    expect(result.statusCode).toBe(200);
    expect(body.work.title).toBe('The Lantern Keeper');
    expect(body.reviewCount).toBe(1);
    expect(body.reviews).toEqual([
      { workId: '1', text: 'Loved the lighthouse imagery.', rating: 5, votes: 3, spoiler: false },
    ]);
    expect(body.similar).toEqual([
      { id: '2', title: 'Salt and Iron', author: 'Ben Okafor', publicationYear: 1898 },
      { id: '3', title: 'Quiet Orbit', author: 'Ada Marsh', publicationYear: 2001 },
    ]);
  });

  it('includes spoilers when asked', async () => {
    const body = (await call({ id: '1', spoilers: '1' })).body as BookDetailResponse;
    expect(body.reviewCount).toBe(2);
    expect(body.reviews).toHaveLength(2);
  });

  it('answers 404 for an unknown id and 400 without one', async () => {
    expect((await call({ id: '42' })).statusCode).toBe(404);
    expect((await call({})).statusCode).toBe(400);
  });
});
