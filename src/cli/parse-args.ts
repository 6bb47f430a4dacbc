export type ReportArgs = {
  command: 'report';
  inputPath: string;
  limit?: number;
  stopWordsPath?: string;
  logPath?: string;
};

export type HelpArgs = {
  command: 'help';
};

export type ParsedArgs = ReportArgs | HelpArgs;

export type ParseError = {
  error: string;
  usage?: string;
};

export type ParseResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: ParseError };

const USAGE_HINT = 'Run "hn-keywords --help" for usage information.';

const VALUE_OPTIONS = ['--limit', '--stop-words', '--log'] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(arg: string): arg is ValueOption {
  return VALUE_OPTIONS.some((option) => option === arg);
}

function failure(error: string): ParseResult {
  return { ok: false, error: { error, usage: USAGE_HINT } };
}

export function parseArgs(argv: string[]): ParseResult {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return { ok: true, args: { command: 'help' } };
  }

  const values = new Map<ValueOption, string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (isValueOption(name)) {
      const value = eq === -1 ? args[i + 1] : arg.slice(eq + 1);
      if (value === undefined || value === '' || (eq === -1 && value.startsWith('-'))) {
        return failure(`Missing value for ${name}`);
      }
      values.set(name, value);
      if (eq === -1) i++; // skip value
    } else if (arg.startsWith('-')) {
      return failure(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const inputPath = positionals[0];
  if (!inputPath) {
    return failure('Missing required argument: <stories.json>');
  }
  if (positionals.length > 1) {
    return failure(`Unexpected argument: ${positionals[1]}`);
  }

  const parsed: ReportArgs = { command: 'report', inputPath };

  const limit = values.get('--limit');
  if (limit !== undefined) {
    const n = Number(limit);
    if (!Number.isInteger(n) || n <= 0) {
      return failure(`Invalid value for --limit: ${limit}`);
    }
    parsed.limit = n;
  }
  const stopWordsPath = values.get('--stop-words');
  if (stopWordsPath !== undefined) parsed.stopWordsPath = stopWordsPath;
  const logPath = values.get('--log');
  if (logPath !== undefined) parsed.logPath = logPath;

  return { ok: true, args: parsed };
}
