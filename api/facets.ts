import type { VercelRequest, VercelResponse } from '@vercel/node';
import { DatasetError, errorMessage } from '../src/lib/errors.js';
import { extractAuthors, extractGenres, numericBounds } from '../src/lib/filters.js';
import { datasetStats, type DatasetStats } from '../src/lib/stats.js';
import type { Range, ReviewsSource } from '../src/lib/types.js';
import { getDataset, getDatasetVersion } from './data.js';
import { CACHE_DURATION, CACHE_KEYS, cacheKey, getCached, setCached } from './redis.js';

export type FacetsResponse = {
  genres: string[];
  authors: string[];
  yearBounds: Range;
  pageBounds: Range;
  stats: DatasetStats;
  dictionary: Record<string, string>;
  reviewsSource: ReviewsSource;
};

// Used when no work has a year / page count
export const DEFAULT_YEAR_BOUNDS: Range = [-500, 2023];
export const DEFAULT_PAGE_BOUNDS: Range = [1, 2000];

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
    const dataset = await getDataset();
    const key = cacheKey(CACHE_KEYS.FACETS, await getDatasetVersion());
    const cached = await getCached<FacetsResponse>(key);
    if (cached) {
      return res.json(cached);
    }

    const body: FacetsResponse = {
      genres: extractGenres(dataset.works),
      authors: extractAuthors(dataset.works),
      yearBounds: numericBounds(dataset.works, (work) => work.publicationYear, DEFAULT_YEAR_BOUNDS),
      pageBounds: numericBounds(dataset.works, (work) => work.pageCount, DEFAULT_PAGE_BOUNDS),
      stats: datasetStats(dataset),
      dictionary: dataset.dictionary,
      reviewsSource: dataset.reviewsSource,
    };
    await setCached(key, body, CACHE_DURATION.FACETS);
    return res.json(body);
  } catch (error) {
    if (error instanceof DatasetError && error.fatal) {
      console.error('Dataset error:', error.message);
      return res.status(503).json({ error: error.message });
    }
    console.error('Error loading facets:', error);
    return res.status(500).json({ error: errorMessage(error, 'Failed to load facets') });
  }
}
