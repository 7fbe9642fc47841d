import 'dotenv/config';
import { LIST_FILTER_ALL, handler as listCatalog } from '@flows/listCatalog';
import { VINYL_STATUSES } from '@shared';

const STATUS_CHOICES: string[] = [LIST_FILTER_ALL, ...Object.values(VINYL_STATUSES)];

interface CliOptions {
  status: string;
  limit?: number;
}

function parseArgs(argv: string[]): CliOptions {
  const [, , ...rest] = argv;
  const options: CliOptions = { status: LIST_FILTER_ALL };

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (arg === '--status' || arg === '-s') {
      const next = (rest[i + 1] ?? '').toLowerCase();
      if (!STATUS_CHOICES.includes(next)) {
        throw new Error(`Invalid --status value: ${rest[i + 1]} (choose from ${STATUS_CHOICES.join(', ')})`);
      }
      options.status = next;
      i += 1;
      continue;
    }

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

    throw new Error(`Unknown argument: ${arg}\nUsage: npm run list -- [--status <${STATUS_CHOICES.join('|')}>] [--limit <n>]`);
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv);
  const rows = await listCatalog(options);

  if (rows.length === 0) {
    console.log('No records found.');
    return;
  }

  console.log(`Cataloged records (${options.status}): ${rows.length}`);
  console.table(
    rows.map((row) => ({
      Row: row.rowIndex,
      Name: row.name.slice(0, 30) || '-',
      Artist: row.artist.slice(0, 20) || '-',
      Year: row.year || '-',
      Price: row.price || '-',
      Status: row.status || '-',
      Published: row.publishedAt || '-'
    }))
  );
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
