import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { GuideService } from './guideService';

const SUPPORTED_EXTENSIONS = new Set(['.txt', '.md', '.markdown']);

interface IngestFileResult {
  name: string;
  chunkCount: number;
  replaced: number;
}

export interface DirectoryIngestSummary {
  files: number;
  chunks: number;
  details: IngestFileResult[];
}

async function collectFiles(rootDir: string): Promise<string[]> {
  const stack = [rootDir];
  const files: string[] = [];

  while (stack.length) {
    const current = stack.pop();
    if (!current) {
      continue;
    }

    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
        continue;
      }
      if (SUPPORTED_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
  }

  return files.sort();
}

/**
 * Imports every guide file under `dir` into the global library. A file is
 * stored under its path relative to `dir`; re-running replaces the global
 * document of the same name.
 */
export async function ingestGuidesFromDirectory(service: GuideService, dir: string): Promise<DirectoryIngestSummary> {
  const rootDir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
  const files = await collectFiles(rootDir);
  const existing = await service.store.listDocuments({ scope: 'global' });

  const details: IngestFileResult[] = [];
  for (const filePath of files) {
    const name = path.relative(rootDir, filePath).replace(/[\\/]+/g, '/');
    const rawText = await fs.readFile(filePath, 'utf8');

    let replaced = 0;
    for (const doc of existing.filter((item) => item.name === name)) {
      if (await service.deleteDocument(doc.id)) {
        replaced += 1;
      }
    }

    const result = await service.ingestDocument({ name, rawText, visibility: { scope: 'global' } });
    if (!result) {
      console.log(`[guide:ingest] ${name} skipped (empty)`);
      continue;
    }
    details.push({ name, chunkCount: result.chunkCount, replaced });
  }

  return {
    files: details.length,
    chunks: details.reduce((sum, item) => sum + item.chunkCount, 0),
    details,
  };
}
