import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';

// Code loaded by the API functions runs as native Node ESM, which needs the
// file extension on every relative import.
const ROOT = fileURLToPath(new URL('..', import.meta.url));
const SERVER_DIRS = ['api', 'api/books', 'src/lib', 'scripts'];

const RELATIVE_IMPORT = /(?:from|import)\s*\(?\s*['"](\.{1,2}\/[^'"]+)['"]/g;

const sourceFiles = () =>
  SERVER_DIRS.flatMap((dir) =>
    readdirSync(join(ROOT, dir))
      .filter((name) => name.endsWith('.ts') && !name.endsWith('.test.ts'))
      .map((name) => join(dir, name))
  );

describe('server-side imports', () => {
  it('finds the modules the API functions load', () => {
    expect(sourceFiles()).toContain(join('src/lib', 'csv.ts'));
    expect(sourceFiles()).toContain(join('api', 'books.ts'));
  });

  it('end every relative specifier in .js', () => {
    const extensionless = sourceFiles().flatMap((file) =>
      Array.from(readFileSync(join(ROOT, file), 'utf-8').matchAll(RELATIVE_IMPORT))
        .map((match) => match[1])
        .filter((specifier) => !specifier.endsWith('.js'))
        .map((specifier) => `${file}: ${specifier}`)
    );
    expect(extensionless).toEqual([]);
  });
});
