import Table from 'cli-table3';
import pc from 'picocolors';

export function printTable(
  data: Record<string, unknown>[],
  options?: Table.TableConstructorOptions,
) {
  const head = options?.head ?? Object.keys(data[0] ?? {});
  const table = new Table({ head, ...options });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function formatSimilarity(similarity: number): string {
  const text = similarity.toFixed(3);
  if (similarity >= 0.6) return pc.green(text);
  if (similarity >= 0.3) return pc.yellow(text);
  return pc.dim(text);
}

export function formatTimestamp(timestamp: number | null): string {
  return timestamp === null ? 'never' : new Date(timestamp).toISOString();
}
