import { authorize, loadConfig, logInfo, openCatalogStore, takeBatch } from '@shared';
import type { CatalogRowView, CatalogStore } from '@shared';

export const LIST_FILTER_ALL = 'todos';

export interface ListCatalogInput {
  status?: string;
  limit?: number;
}

export async function listCatalog(
  catalog: Pick<CatalogStore, 'listAll'>,
  input: ListCatalogInput = {}
): Promise<CatalogRowView[]> {
  const status = input.status && input.status !== LIST_FILTER_ALL ? input.status : undefined;
  const rows = takeBatch(await catalog.listAll(status), input.limit);
  logInfo('ListCatalog invoked', { status: status ?? LIST_FILTER_ALL, count: rows.length });
  return rows;
}

export async function handler(input: ListCatalogInput = {}): Promise<CatalogRowView[]> {
  const config = loadConfig();
  const auth = await authorize(config);
  const catalog = await openCatalogStore(config, auth);
  return listCatalog(catalog, input);
}
