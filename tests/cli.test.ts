import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { parseArgs } from '../src/cli/parse-args.js';
import { formatRanking, runReport } from '../src/cli/commands.js';
import { MAIN_USAGE } from '../src/cli/help.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/stories.json', import.meta.url));

const argv = (...args: string[]) => ['node', 'hn-keywords', ...args];

describe('parseArgs', () => {
  it('returns help with no arguments or --help', () => {
    expect(parseArgs(argv())).toEqual({ ok: true, args: { command: 'help' } });
    expect(parseArgs(argv('stories.json', '-h'))).toEqual({ ok: true, args: { command: 'help' } });
  });

  it('parses the input path and options', () => {
    expect(
      parseArgs(argv('stories.json', '--limit', '10', '--stop-words=words.json', '--log', 'run.log'))
    ).toEqual({
      ok: true,
      args: {
        command: 'report',
        inputPath: 'stories.json',
        limit: 10,
        stopWordsPath: 'words.json',
        logPath: 'run.log'
      }
    });
  });

  it('leaves unset options out', () => {
    expect(parseArgs(argv('stories.json'))).toEqual({
      ok: true,
      args: { command: 'report', inputPath: 'stories.json' }
    });
  });

  it('requires an input path', () => {
    expect(parseArgs(argv('--limit', '5'))).toEqual({
      ok: false,
      error: {
        error: 'Missing required argument: <stories.json>',
        usage: 'Run "hn-keywords --help" for usage information.'
      }
    });
  });

  it('rejects an invalid limit', () => {
    const result = parseArgs(argv('stories.json', '--limit', 'ten'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.error).toBe('Invalid value for --limit: ten');
    }
  });

  it('rejects a missing option value', () => {
    const result = parseArgs(argv('stories.json', '--limit'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.error).toBe('Missing value for --limit');
    }
  });

  it('rejects unknown options and extra arguments', () => {
    const unknown = parseArgs(argv('stories.json', '--verbose'));
    const extra = parseArgs(argv('a.json', 'b.json'));

    expect(unknown.ok ? undefined : unknown.error.error).toBe('Unknown option: --verbose');
    expect(extra.ok ? undefined : extra.error.error).toBe('Unexpected argument: b.json');
  });
});

describe('MAIN_USAGE', () => {
  it('opens with the command name and a plain summary line', () => {
    expect(MAIN_USAGE.split('\n')[0]).toBe(
      'hn-keywords: rank the most frequent keywords in popular Hacker News titles'
    );
    expect(MAIN_USAGE).not.toContain('\u2014');
  });
});

describe('formatRanking', () => {
  it('numbers each keyword', () => {
    expect(
      formatRanking([
        ['python', 3],
        ['new', 2]
      ])
    ).toBe('1. python 3\n2. new 2');
  });
});

describe('runReport', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('prints the ranking and logs to stderr', () => {
    const stdout: string[] = [];
    const stderr: string[] = [];

    runReport(
      { command: 'report', inputPath: FIXTURE, limit: 2 },
      { stdout: { write: (c) => stdout.push(c) }, stderr: { write: (c) => stderr.push(c) } }
    );

    expect(stdout.join('')).toBe('1. python 3\n2. new 2\n');
    expect(stderr).toHaveLength(18); // run:start, start+done for 8 tasks, run:done
    expect(stderr[0]).toMatch(/\] Pipeline started with 8 tasks\n$/);
  });

  it('writes the log to a file when asked', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'cli-test-'));
    const logPath = join(tempDir, 'run.log');
    const stderr: string[] = [];

    runReport(
      { command: 'report', inputPath: FIXTURE, limit: 1, logPath },
      { stdout: { write: () => true }, stderr: { write: (c) => stderr.push(c) } }
    );

    expect(stderr).toEqual([]);
    const lines = readFileSync(logPath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(18);
    expect(lines[17]).toMatch(/\] Pipeline completed 8 tasks$/);
  });
});
