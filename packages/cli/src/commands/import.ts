import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import pc from 'picocolors';
import { z } from 'zod';
import { formatZodIssues, UsageError } from '@recall/shared';
import type { NewMessage } from '@recall/memory';
import { globalOptions, openRuntime, type RuntimeOptions } from '../runtime';
import { printJson } from '../output';

const idLike = z.union([z.string().min(1), z.number()]).transform(String);

export const ImportedMessageSchema = z.object({
  id: idLike,
  threadId: idLike.default('default'),
  sender: z.string().default(''),
  body: z.string(),
  timestamp: z
    .union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
    .transform((value) => (typeof value === 'number' ? value : Date.parse(value))),
});

/**
 * Accepts a JSON array of messages or one JSON object per line.
 */
export function parseMessageFile(content: string, source: string): NewMessage[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const records: { line: number; value: unknown }[] = [];
  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new UsageError(`${source} is not valid JSON`, { cause: error });
    }
    if (!Array.isArray(parsed)) {
      throw new UsageError(`${source} must contain a JSON array of messages`);
    }
    parsed.forEach((value: unknown, index) => records.push({ line: index + 1, value }));
  } else {
    content.split(/\r?\n/).forEach((text, index) => {
      if (text.trim() === '') return;
      try {
        records.push({ line: index + 1, value: JSON.parse(text) });
      } catch (error) {
        throw new UsageError(`${source}:${index + 1} is not valid JSON`, { cause: error });
      }
    });
  }

  return records.map(({ line, value }) => {
    const result = ImportedMessageSchema.safeParse(value);
    if (!result.success) {
      throw new UsageError(`${source}:${line} is not a valid message:\n${formatZodIssues(result.error)}`);
    }
    return result.data;
  });
}

export function registerImportCommand(program: Command, runtimeOptions: RuntimeOptions = {}) {
  program
    .command('import <file>')
    .description('Import messages from a JSON or JSONL file')
    .action((file: string, _options: unknown, command: Command) => {
      const globalOpts = globalOptions(command);
      const filePath = resolve(runtimeOptions.cwd ?? process.cwd(), file);
      const messages = parseMessageFile(readFileSync(filePath, 'utf8'), file);

      const runtime = openRuntime(globalOpts, runtimeOptions);
      try {
        const imported = runtime.store.insertMessages(messages);
        const status = runtime.store.status(runtime.indexEmbedder.version());

        if (globalOpts.json) {
          printJson({ imported, status });
          return;
        }
        console.log(pc.green(`Imported ${imported} messages.`));
        if (status.missing + status.stale > 0) {
          console.log(`${status.missing + status.stale} messages need indexing. Run 'recall index'.`);
        }
      } finally {
        runtime.close();
      }
    });
}
