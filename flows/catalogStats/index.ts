import { VINYL_STATUSES, authorize, loadConfig, openCatalogStore } from '@shared';
import type { CatalogRowView, CatalogStats, CatalogStore } from '@shared';

function percentage(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

export function computeCatalogStats(rows: CatalogRowView[]): CatalogStats {
  const countStatus = (status: string) =>
    rows.filter((row) => row.status.trim().toLowerCase() === status).length;

  const total = rows.length;
  const pending = countStatus(VINYL_STATUSES.PENDING);
  const published = countStatus(VINYL_STATUSES.PUBLISHED);
  const sold = countStatus(VINYL_STATUSES.SOLD);

  return {
    total,
    pending,
    published,
    sold,
    publicationRate: percentage(published, total),
    conversionRate: percentage(sold, published)
  };
}

export async function catalogStats(catalog: Pick<CatalogStore, 'listAll'>): Promise<CatalogStats> {
  return computeCatalogStats(await catalog.listAll());
}

export async function handler(): Promise<CatalogStats> {
  const config = loadConfig();
  const auth = await authorize(config);
  const catalog = await openCatalogStore(config, auth);
  return catalogStats(catalog);
}
