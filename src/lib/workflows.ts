export const CATALOG_STEPS = [
  'AcquireImages',
  'AnalyzeImages',
  'AttachImageUrls',
  'GenerateListing',
  'UpsertRecord'
] as const;

export const PUBLISH_STEPS = ['ResolveImages', 'PostAlbum', 'MarkPublished'] as const;

export type CatalogStepName = (typeof CATALOG_STEPS)[number];
export type PublishStepName = (typeof PUBLISH_STEPS)[number];

export interface WorkflowSummary<TStep extends string> {
  startAt: TStep;
  steps: TStep[];
}

export function describeCatalogWorkflow(): WorkflowSummary<CatalogStepName> {
  return {
    startAt: CATALOG_STEPS[0],
    steps: [...CATALOG_STEPS]
  };
}

export function describePublishWorkflow(): WorkflowSummary<PublishStepName> {
  return {
    startAt: PUBLISH_STEPS[0],
    steps: [...PUBLISH_STEPS]
  };
}

/** Applies an optional batch limit; a missing or non-positive limit keeps every item. */
export function takeBatch<T>(items: T[], limit?: number): T[] {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return items;
  }
  return items.slice(0, Math.floor(limit));
}
