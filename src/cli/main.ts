#!/usr/bin/env node
import { parseArgs } from './parse-args.js';
import { runReport } from './commands.js';
import { MAIN_USAGE } from './help.js';

function main(): void {
  const result = parseArgs(process.argv);

  if (!result.ok) {
    console.error(`Error: ${result.error.error}`);
    if (result.error.usage) {
      console.error(result.error.usage);
    }
    process.exit(1);
  }

  const { args } = result;

  switch (args.command) {
    case 'help':
      console.log(MAIN_USAGE);
      break;
    case 'report':
      runReport(args, { stdout: process.stdout, stderr: process.stderr });
      break;
  }
}

try {
  main();
} catch (err: unknown) {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
}
