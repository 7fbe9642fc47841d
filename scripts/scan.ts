import 'dotenv/config';
import { handler as scanCatalog } from '@flows/scanCatalog';

interface CliOptions {
  limit?: number;
}

function parseArgs(argv: string[]): CliOptions {
  const [, , ...rest] = argv;
  const options: CliOptions = {};

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (arg === '--limit' || arg === '-l') {
      const next = rest[i + 1];
      const parsed = next ? Number.parseInt(next, 10) : Number.NaN;
      if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`Invalid --limit value: ${next}`);
      }
      options.limit = parsed;
      i += 1;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}\nUsage: npm run scan -- [--limit <n>]`);
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv);
  console.log('Scanning Drive images and cataloging records...');

  const result = await scanCatalog(options);
  if (result.catalogedCount > 0) {
    console.log(`${result.catalogedCount} of ${result.pairCount} records cataloged.`);
  } else {
    console.warn('No records were cataloged.');
  }
  if (result.reviewCount > 0) {
    console.warn(`${result.reviewCount} records need manual review in the sheet.`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
