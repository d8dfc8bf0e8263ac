import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { RetrievalError } from '@epirisk/shared/src/utils/errors.js';
import type { EvidenceStore } from './evidence-store.js';

const log = createChildLogger('retrieval:corpus-indexer');

async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { recursive: true });
    return entries.map((entry) => join(directory, entry)).sort();
  } catch (error) {
    const nodeError = error instanceof Error ? error : new Error(String(error));
    throw new RetrievalError(`Cannot read corpus directory ${directory}: ${nodeError.message}`, nodeError);
  }
}

/**
 * Indexes every file under `directory` whose extension is listed. Files that
 * cannot be read or embedded are logged and skipped. Returns the chunk count.
 */
export async function indexDirectory(
  store: EvidenceStore,
  directory: string,
  extensions: readonly string[],
): Promise<number> {
  const wanted = new Set(extensions.map((extension) => extension.toLowerCase()));
  const files = (await listFiles(directory)).filter((file) =>
    wanted.has(extname(file).toLowerCase()),
  );

  log.info({ directory, fileCount: files.length }, 'Indexing corpus');

  let totalChunks = 0;
  for (const file of files) {
    try {
      const text = await readFile(file, 'utf-8');
      totalChunks += await store.indexDocument(file, text);
    } catch (error) {
      log.warn(
        { file, error: error instanceof Error ? error.message : String(error) },
        'Failed to index file, skipping',
      );
    }
  }

  log.info({ directory, totalChunks }, 'Corpus indexed');
  return totalChunks;
}
