import type { SearchRequest } from './types';

export const MIN_RESULTS = 1;
export const MAX_RESULTS = 20;
export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_THRESHOLD = 0.15;

export interface SearchRequestInput {
  query: string;
  maxResults?: number;
  threshold?: number;
}

export interface SearchDefaults {
  maxResults: number;
  threshold: number;
}

/** Truncates to an integer within [1, 20]; non-finite input falls back. */
export function clampMaxResults(
  value: number | undefined,
  fallback: number = DEFAULT_MAX_RESULTS,
): number {
  const raw = value === undefined || !Number.isFinite(value) ? fallback : Math.trunc(value);
  return Math.min(MAX_RESULTS, Math.max(MIN_RESULTS, raw));
}

/** Clamps to [0, 1]; non-finite input falls back. */
export function clampThreshold(
  value: number | undefined,
  fallback: number = DEFAULT_THRESHOLD,
): number {
  const raw = value === undefined || !Number.isFinite(value) ? fallback : value;
  return Math.min(1, Math.max(0, raw));
}

export function normalizeSearchRequest(
  input: SearchRequestInput,
  defaults: Partial<SearchDefaults> = {},
): SearchRequest {
  return {
    query: input.query,
    maxResults: clampMaxResults(input.maxResults, defaults.maxResults ?? DEFAULT_MAX_RESULTS),
    threshold: clampThreshold(input.threshold, defaults.threshold ?? DEFAULT_THRESHOLD),
  };
}
