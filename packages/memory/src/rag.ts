import type { SimilaritySearchEngine } from './search';

export interface RagContextOptions {
  maxResults?: number;
  /** Upper bound on the returned string length */
  maxContextLength?: number;
  threshold?: number;
  /** IANA zone used for the Date lines; defaults to the process zone */
  timeZone?: string;
}

export const DEFAULT_RAG_MAX_RESULTS = 3;
export const DEFAULT_RAG_MAX_CONTEXT_LENGTH = 1000;

const RAG_HEADER = 'Relevant messages:\n\n';

/** Formats as `Mar 05, 2024 at 02:30 PM`. */
export function formatMessageDate(timestamp: number, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    month: 'short',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
    timeZone,
  }).formatToParts(new Date(timestamp));

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('month')} ${part('day')}, ${part('year')} at ${part('hour')}:${part('minute')} ${part('dayPeriod')}`;
}

/**
 * Renders the best matches for `query` as a plain-text block for a
 * downstream text generator. Messages are appended whole until the next
 * one would exceed `maxContextLength`. Returns null when no message fits.
 */
export async function buildRagContext(
  engine: SimilaritySearchEngine,
  query: string,
  options: RagContextOptions = {},
): Promise<string | null> {
  const maxContextLength = options.maxContextLength ?? DEFAULT_RAG_MAX_CONTEXT_LENGTH;
  const { hits } = await engine.run({
    query,
    maxResults: options.maxResults ?? DEFAULT_RAG_MAX_RESULTS,
    threshold: options.threshold,
  });

  let context = RAG_HEADER;
  let included = 0;
  for (const [index, hit] of hits.entries()) {
    const block =
      `Message ${index + 1}:\n` +
      `From: ${hit.sender}\n` +
      `Date: ${formatMessageDate(hit.timestamp, options.timeZone)}\n` +
      `Content: ${hit.body}\n`;
    if (context.length + block.length > maxContextLength) break;
    context += `${block}\n`;
    included++;
  }

  return included === 0 ? null : context.trim();
}
