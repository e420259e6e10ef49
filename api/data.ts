import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { DEFAULT_PATHS, loadDataset, type DatasetPaths, type DatasetSource } from '../src/lib/dataset.js';
import type { Dataset, ReviewsSource } from '../src/lib/types.js';

/**
 * Data file locations. Read on each call so a test (or `vercel env`) can
 * point DATA_DIR somewhere else before the first load.
 */
export function getDataConfig(): { dir: string; paths: DatasetPaths } {
  const env = process.env;
  return {
    dir: env.DATA_DIR || join(process.cwd(), 'data'),
    paths: {
      works: env.WORKS_FILE || DEFAULT_PATHS.works,
      reviews: env.REVIEWS_FILE || DEFAULT_PATHS.reviews,
      reviewsSample: env.REVIEWS_SAMPLE_FILE || DEFAULT_PATHS.reviewsSample,
      dictionary: env.DICTIONARY_FILE || DEFAULT_PATHS.dictionary,
    },
  };
}

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');

export const fileSource = (dir: string): DatasetSource => ({
  async readText(path: string) {
    try {
      return await readFile(join(dir, path), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  },
});

/**
 * Identifies the files a dataset was read from by size and modification
 * time, so cache keys change when the data does.
 */
export async function dataVersion(
  dir: string,
  paths: DatasetPaths,
  reviewsSource: ReviewsSource
): Promise<string> {
  const files = [paths.works, reviewsSource === 'sample' ? paths.reviewsSample : paths.reviews];
  if (paths.dictionary) files.push(paths.dictionary);
  const parts = await Promise.all(
    files.map(async (file) => {
      try {
        const info = await stat(join(dir, file));
        return `${info.size.toString(36)}-${Math.trunc(info.mtimeMs).toString(36)}`;
      } catch (err) {
        if (isMissingFile(err)) return '0';
        throw err;
      }
    })
  );
  return `${reviewsSource}.${parts.join('.')}`;
}

type LoadedDataset = { dataset: Dataset; version: string };

// One load per warm instance; concurrent cold requests share the promise
let loading: Promise<LoadedDataset> | null = null;

function loadOnce(): Promise<LoadedDataset> {
  if (!loading) {
    const { dir, paths } = getDataConfig();
    console.log('Loading dataset from', dir);
    const started = Date.now();
    loading = loadDataset(fileSource(dir), paths)
      .then(async (dataset) => ({
        dataset,
        version: await dataVersion(dir, paths, dataset.reviewsSource),
      }))
      .then(
        (loaded) => {
          console.log(
            `Dataset ${loaded.version} ready in ${Date.now() - started}ms:`,
            loaded.dataset.works.length, 'works,',
            loaded.dataset.reviewCount, 'reviews'
          );
          return loaded;
        },
        (err: unknown) => {
          // Let the next request try again once the files are in place
          loading = null;
          throw err;
        }
      );
  }
  return loading;
}

export function getDataset(): Promise<Dataset> {
  return loadOnce().then((loaded) => loaded.dataset);
}

/** Version string of the loaded dataset, for cache keys. */
export function getDatasetVersion(): Promise<string> {
  return loadOnce().then((loaded) => loaded.version);
}

export function resetDataset(): void {
  loading = null;
}
