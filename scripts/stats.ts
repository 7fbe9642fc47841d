import 'dotenv/config';
import { handler as catalogStats } from '@flows/catalogStats';

async function main() {
  const stats = await catalogStats();
  if (stats.total === 0) {
    console.log('No records cataloged yet.');
    return;
  }

  console.log('Catalog summary');
  console.log('===============');
  console.log(`Total records: ${stats.total}`);
  console.log(`  Pending:   ${stats.pending}`);
  console.log(`  Published: ${stats.published}`);
  console.log(`  Sold:      ${stats.sold}`);
  console.log('');
  console.log(`Publication rate: ${stats.publicationRate.toFixed(1)}%`);
  console.log(`Conversion rate:  ${stats.conversionRate.toFixed(1)}%`);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
