import type { VercelRequest, VercelResponse } from '@vercel/node';
import { DatasetError, QueryError, errorMessage } from '../src/lib/errors.js';
import { exportCsv } from '../src/lib/export.js';
import { cacheKeyFor, parseBooksQuery } from '../src/lib/query.js';
import { recommend } from '../src/lib/recommend.js';
import { ratingHistogram, type RatingBucket } from '../src/lib/stats.js';
import type { Work } from '../src/lib/types.js';
import { getDataset, getDatasetVersion } from './data.js';
import { CACHE_DURATION, CACHE_KEYS, cacheKey, getCached, setCached } from './redis.js';

export type BooksResponse = {
  total: number;
  count: number;
  columns: string[];
  histogram: RatingBucket[]; // over all matches, not just items
  items: Work[];
};

export const EXPORT_FILE_NAME = 'filtered_books.csv';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  if (req.method === 'OPTIONS') {
    return res.status(200).end();
  }

  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  try {
    const query = parseBooksQuery(req.query);
    const cacheable = !query.surprise && query.format === 'json';
    const dataset = await getDataset();
    const key = cacheKey(CACHE_KEYS.BOOKS, await getDatasetVersion(), cacheKeyFor(query));

    if (cacheable) {
      const cached = await getCached<BooksResponse>(key);
      if (cached) {
        return res.json(cached);
      }
    }

    const result = recommend(dataset, query.params, {
      limit: query.limit,
      surprise: query.surprise,
    });

    if (query.format === 'csv') {
      // Whole filtered set, original columns
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILE_NAME}"`);
      return res.status(200).send(exportCsv(result.matches, dataset.workColumns));
    }

    const body: BooksResponse = {
      total: result.total,
      count: result.items.length,
      columns: dataset.workColumns,
      histogram: ratingHistogram(result.matches),
      items: result.items,
    };
    if (cacheable) {
      await setCached(key, body, CACHE_DURATION.BOOKS);
    }
    return res.json(body);
  } catch (error) {
    if (error instanceof QueryError) {
      return res.status(400).json({ error: error.message, param: error.param });
    }
    if (error instanceof DatasetError && error.fatal) {
      console.error('Dataset error:', error.message);
      return res.status(503).json({ error: error.message });
    }
    console.error('Error filtering books:', error);
    return res.status(500).json({ error: errorMessage(error, 'Failed to filter books') });
  }
}
