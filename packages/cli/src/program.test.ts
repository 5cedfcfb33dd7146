import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { UsageError } from '@recall/shared';
import { createProgram, exitCodeFor, name, runCli } from './program';
import { parseMessageFile } from './commands/import';

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@recall/cli');
  });
});

describe('parseMessageFile', () => {
  it('reads JSONL, coercing ids and parsing ISO timestamps', () => {
    const content = [
      '{"id":7,"body":"hello","timestamp":"2024-03-05T14:30:00Z"}',
      '',
      '{"id":"b","threadId":9,"sender":"+15550100","body":"x","timestamp":5}',
    ].join('\n');

    expect(parseMessageFile(content, 'msgs.jsonl')).toEqual([
      { id: '7', threadId: 'default', sender: '', body: 'hello', timestamp: 1709649000000 },
      { id: 'b', threadId: '9', sender: '+15550100', body: 'x', timestamp: 5 },
    ]);
  });

  it('reads a JSON array', () => {
    const content = JSON.stringify([{ id: 'a', threadId: 't', sender: 's', body: 'b', timestamp: 1 }]);
    expect(parseMessageFile(content, 'msgs.json')).toEqual([
      { id: 'a', threadId: 't', sender: 's', body: 'b', timestamp: 1 },
    ]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseMessageFile('  \n', 'msgs.json')).toEqual([]);
  });

  it('names the offending line', () => {
    const content = '{"id":"a","body":"ok","timestamp":1}\n{"id":"b","timestamp":2}';
    expect(() => parseMessageFile(content, 'msgs.jsonl')).toThrow(UsageError);
    expect(() => parseMessageFile(content, 'msgs.jsonl')).toThrow(
      'msgs.jsonl:2 is not a valid message:\nbody: Required',
    );
  });

  it('rejects malformed JSON', () => {
    expect(() => parseMessageFile('[1,', 'msgs.json')).toThrow('msgs.json is not valid JSON');
    expect(() => parseMessageFile('{"id":', 'msgs.jsonl')).toThrow('msgs.jsonl:1 is not valid JSON');
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for caller mistakes and 1 otherwise', () => {
    expect(exitCodeFor(new UsageError('bad'))).toBe(2);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});

describe('recall commands', () => {
  let cwd: string;
  let logSpy: MockInstance<typeof console.log>;

  const run = (...args: string[]) => runCli(args, createProgram({ cwd, env: {} }));

  const lastLine = (): unknown => {
    const calls = logSpy.mock.calls;
    return calls[calls.length - 1]?.[0];
  };

  const lastJson = (): unknown => JSON.parse(String(lastLine()));

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'recall-cli-'));
    writeFileSync(join(cwd, '.recall.yaml'), 'logging:\n  level: error\n');
    writeFileSync(
      join(cwd, 'messages.json'),
      JSON.stringify([
        { id: 'm1', threadId: 't1', sender: '+15550101', body: 'gate code', timestamp: 1_700_000_000_000 },
        { id: 'm2', threadId: 't1', sender: '+15550102', body: 'roof repair', timestamp: 1_700_000_100_000 },
        { id: 'm3', threadId: 't2', sender: '+15550103', body: 'budget discuss', timestamp: 1_700_000_200_000 },
      ]),
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('imports, indexes and searches', async () => {
    expect(await run('--json', 'import', 'messages.json')).toBe(0);
    expect(lastJson()).toMatchObject({ imported: 3, status: { total: 3, embedded: 0 } });

    expect(await run('--json', 'index')).toBe(0);
    expect(lastJson()).toEqual({
      state: 'COMPLETED',
      processed: 3,
      failed: 0,
      total: 3,
      message: 'Indexed 3 messages',
    });

    expect(await run('--json', 'search', 'roof repair')).toBe(0);
    expect(lastJson()).toMatchObject({
      query: 'roof repair',
      maxResults: 5,
      threshold: 0.15,
      scanned: 3,
      skippedCorrupt: 0,
      results: [
        {
          messageId: 'm2',
          threadId: 't1',
          sender: '+15550102',
          snippet: 'roof repair',
          similarity: 1,
        },
      ],
    });

    expect(await run('--json', 'status')).toBe(0);
    expect(lastJson()).toMatchObject({
      embedder: 'tfidf-hash:v1:384',
      status: { total: 3, embedded: 3, missing: 0, stale: 0 },
      corpus: null,
    });
  });

  it('prints retrieval context', async () => {
    await run('--json', 'import', 'messages.json');
    await run('--json', 'index');

    expect(await run('context', 'roof repair')).toBe(0);
    const context = String(lastLine());
    expect(context.startsWith('Relevant messages:\n\nMessage 1:\nFrom: +15550102\nDate: ')).toBe(true);
    expect(context.endsWith('\nContent: roof repair')).toBe(true);
  });

  it('reports a blank query as a usage error', async () => {
    expect(await run('--json', 'search', '   ')).toBe(2);
    expect(lastJson()).toMatchObject({ error: { code: 'UsageError' } });
  });

  it('reports a missing config file as a config error', async () => {
    expect(await run('--json', '--config', 'missing.yaml', 'status')).toBe(2);
    expect(lastJson()).toMatchObject({
      error: { code: 'ConfigError', message: `Config file not found: ${join(cwd, 'missing.yaml')}` },
    });
  });
});
