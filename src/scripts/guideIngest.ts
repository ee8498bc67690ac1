import 'dotenv/config';
import path from 'node:path';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { env } from '../config/env';
import { getGuideService } from '../services/guide';
import { ingestGuidesFromDirectory } from '../services/guide/ingestGuides';

function parseDirFromArgv(): string | undefined {
  const dirFlagIndex = process.argv.findIndex((arg) => arg === '--dir');
  if (dirFlagIndex >= 0 && process.argv[dirFlagIndex + 1]) {
    return process.argv[dirFlagIndex + 1];
  }
  return undefined;
}

async function main(): Promise<void> {
  const dir = parseDirFromArgv() ?? env.GUIDE_INGEST_DIR;
  const absDir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
  console.log(`[guide:ingest] directory: ${absDir}`);

  await connectToDatabase();
  const summary = await ingestGuidesFromDirectory(getGuideService(), absDir);

  const replaced = summary.details.filter((item) => item.replaced > 0).length;
  console.log(`[guide:ingest] completed: files=${summary.files}, chunks=${summary.chunks}, replaced=${replaced}`);
}

main()
  .catch((error) => {
    console.error('[guide:ingest] failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectFromDatabase();
  });
