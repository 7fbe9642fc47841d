import { FIRST_DATA_ROW, authorize, loadConfig, logInfo, openCatalogStore } from '@shared';
import type { CatalogStore } from '@shared';

export interface UpdatePriceInput {
  rowIndex: number;
  price: number;
}

export function validatePriceInput(input: UpdatePriceInput): void {
  if (!Number.isInteger(input.rowIndex) || input.rowIndex < FIRST_DATA_ROW) {
    throw new Error(`Row must be an integer of at least ${FIRST_DATA_ROW} (row 1 is the header): ${input.rowIndex}`);
  }
  if (!Number.isFinite(input.price) || input.price < 0) {
    throw new Error(`Price must be a non-negative number: ${input.price}`);
  }
}

export async function updatePrice(
  catalog: Pick<CatalogStore, 'updatePrice'>,
  input: UpdatePriceInput
): Promise<boolean> {
  validatePriceInput(input);
  logInfo('UpdatePrice invoked', { rowIndex: input.rowIndex, price: input.price });
  return catalog.updatePrice(input.rowIndex, input.price);
}

export async function handler(input: UpdatePriceInput): Promise<boolean> {
  validatePriceInput(input);
  const config = loadConfig();
  const auth = await authorize(config);
  const catalog = await openCatalogStore(config, auth);
  return updatePrice(catalog, input);
}
