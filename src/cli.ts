#!/usr/bin/env node
// src/cli.ts
import { anonymizeFile } from './anonymize.js';
import { parseArgs, toCliOptions } from './cli/args.js';
import { errorMessage } from './errors.js';
import { consoleLogger } from './log.js';

function printUsage(): void {
  console.log(`
  dateshift — shift dates in text files by a random interval to anonymize them

  Usage:
    dateshift <input_file> <output_file> [options]

  Options:
    --max_shift_days <days>    Maximum number of days to shift dates by (default: 365)
    --seed <int>               Random seed for reproducible output (default: unset)
    --date_format <pattern>    strftime-style format used to parse and render dates
                               (default: %Y-%m-%d). Only YYYY-MM-DD shaped text is scanned.
    --encoding <label>         Encoding of the input file (default: detected automatically)
    --json                     Print a machine-readable run summary
    --help                     Show this message
  `.trim());
}

async function main(): Promise<void> {
  const options = toCliOptions(parseArgs(process.argv.slice(2)));
  if (options.help) {
    printUsage();
    return;
  }

  const result = await anonymizeFile({ ...options.config, logger: consoleLogger });
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  }
}

main().catch((err: unknown) => {
  consoleLogger.error(errorMessage(err));
  process.exit(1);
});
