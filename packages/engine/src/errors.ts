/**
 * errors.ts: Failures callers need to tell apart
 *
 * Everything else is logged and degraded in place.
 */

/** No vector index loaded: search is refused rather than run against nothing */
export class SearchUnavailableError extends Error {
  override name = 'SearchUnavailableError';
}

/** The query itself could not be embedded */
export class QueryEmbeddingError extends Error {
  override name = 'QueryEmbeddingError';
}

/** On-demand summary generation failed or returned nothing parsable */
export class InsightGenerationError extends Error {
  override name = 'InsightGenerationError';
}

/** Nothing to index, or every embedding batch failed */
export class IndexBuildError extends Error {
  override name = 'IndexBuildError';
}
