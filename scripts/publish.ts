import 'dotenv/config';
import { handler as publishPending } from '@flows/publishPending';

interface CliOptions {
  limit?: number;
  dryRun: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  const [, , ...rest] = argv;
  const options: CliOptions = { dryRun: false };

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

    if (arg === '--dry-run') {
      options.dryRun = true;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}\nUsage: npm run publish:pending -- [--limit <n>] [--dry-run]`);
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv);
  if (options.dryRun) {
    console.log('Dry run: nothing will be posted.');
  }

  const result = await publishPending(options);
  if (result.pendingCount === 0) {
    console.log('No pending records to publish.');
    return;
  }

  console.log(`${result.pendingCount} pending records.`);
  if (options.dryRun) {
    result.preview.forEach((row, index) => {
      console.log(`${index + 1}. ${row.name} - ${row.artist} (row ${row.rowIndex})`);
    });
    return;
  }

  if (result.publishedCount > 0) {
    console.log(`${result.publishedCount} posts published.`);
  } else {
    console.warn('No posts were published.');
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
