import 'dotenv/config';
import { handler as updatePrice } from '@flows/updatePrice';
import { formatPrice } from '@shared';

interface CliOptions {
  rowIndex: number;
  price: number;
}

function parseArgs(argv: string[]): CliOptions {
  const [, , rowArg, priceArg] = argv;
  if (!rowArg || !priceArg) {
    throw new Error('Usage: npm run price -- <row> <price>   (e.g. npm run price -- 10 49.90)');
  }

  return {
    rowIndex: Number.parseInt(rowArg, 10),
    price: Number.parseFloat(priceArg.replace(',', '.'))
  };
}

async function main() {
  const options = parseArgs(process.argv);
  const updated = await updatePrice(options);

  if (updated) {
    console.log(`Price set to ${formatPrice(options.price)} on row ${options.rowIndex}.`);
  } else {
    console.error('Price update failed.');
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
