import { z } from 'zod';
import { errorMessage, formatZodIssues, UsageError } from '@recall/shared';
import { clampMaxResults, clampThreshold, type SearchDefaults } from './request';
import type { SimilaritySearchEngine } from './search';
import type { SearchRequest } from './types';

/** Numbers and numeric strings pass; anything else means "use the default". */
const looseNumber = z.preprocess((value) => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}, z.number().optional());

export const SearchArgumentsSchema = z.object({
  query: z
    .string({
      required_error: 'query is required',
      invalid_type_error: 'query must be a string',
    })
    .trim()
    .min(1, 'query must not be blank'),
  max_results: looseNumber,
  similarity_threshold: looseNumber,
});

export type SearchArguments = z.infer<typeof SearchArgumentsSchema>;

/**
 * Converts loosely typed tool arguments into a validated SearchRequest.
 * Out-of-range numbers are clamped rather than rejected.
 */
export function parseSearchArguments(
  raw: unknown,
  defaults: Partial<SearchDefaults> = {},
): SearchRequest {
  const parsed = SearchArgumentsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid search arguments:\n${formatZodIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return {
    query: parsed.data.query,
    maxResults: clampMaxResults(parsed.data.max_results, defaults.maxResults),
    threshold: clampThreshold(parsed.data.similarity_threshold, defaults.threshold),
  };
}

export interface ToolHit {
  message_id: string;
  thread_id: string;
  sender: string;
  timestamp: number;
  snippet: string;
  similarity: number;
}

export type ToolResult =
  | {
      success: true;
      data: {
        query: string;
        count: number;
        results: ToolHit[];
      };
    }
  | { success: false; error: string };

/** Runs a search from raw tool arguments and wraps the outcome in an envelope. */
export async function executeSearchTool(
  engine: SimilaritySearchEngine,
  raw: unknown,
): Promise<ToolResult> {
  try {
    const request = parseSearchArguments(raw, engine.defaults());
    const results = await engine.search(request);
    return {
      success: true,
      data: {
        query: request.query,
        count: results.length,
        results: results.map((result) => ({
          message_id: result.messageId,
          thread_id: result.threadId,
          sender: result.sender,
          timestamp: result.timestamp,
          snippet: result.snippet,
          similarity: result.similarity,
        })),
      },
    };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}
