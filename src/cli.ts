#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { analyzeConfig, analyzeIndexes, analyzeNPlusOne } from './index.js';
import { findProjectRoot } from './core/project/findRoot.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import { AnalyzerError } from './util/errors.js';
import type { AnalysisKind, AnalysisResult, OutputFormat, FormatOptions } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_ISSUES = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_FATAL = 3;

const COMMANDS: readonly AnalysisKind[] = ['indexes', 'n-plus-one', 'config'];

function printUsage(): void {
  process.stdout.write(
    `Usage: rails-pg-analyzer <command> [options]

Commands:
  indexes               Missing foreign key indexes, boolean columns, WHERE clause columns
  n-plus-one            Potential N+1 queries in controllers and views (exit 1 on warnings)
  config                Connection settings in config/database.yml

Options:
  --root <dir>          Directory to start looking for the Rails root (default: .)
  --format <fmt>        Output format: text | json (default: text)
  --out <path>          Write output to file instead of stdout
  --no-timestamp        Omit timestamp from output
  --pretty              Pretty-print JSON output
  --findings-only       Omit the schema, associations or environments section
  --help                Show this help message
`,
  );
}

function isCommand(value: string): value is AnalysisKind {
  return COMMANDS.some((command) => command === value);
}

export async function main(argv?: string[]): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  const command = args.positionals[0];
  if (command === undefined || !isCommand(command) || args.positionals.length > 1) {
    process.stderr.write(
      `Error: Expected one command: ${COMMANDS.join(', ')}. Use --help for usage.\n`,
    );
    return EXIT_CLI_ERROR;
  }

  // Validate format
  const format = args.values.format;
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(
      `Error: Invalid format "${format}". Must be "json" or "text".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;
  const formatOptions: FormatOptions = { findingsOnly: args.values['findings-only'] };

  // Locate the project and run the analysis
  let result: AnalysisResult;
  try {
    const root = findProjectRoot(args.values.root ?? '.');
    const options = { root, noTimestamp: args.values['no-timestamp'] };
    result = command === 'indexes'
      ? await analyzeIndexes(options)
      : command === 'n-plus-one'
        ? await analyzeNPlusOne(options)
        : await analyzeConfig(options);
  } catch (error: unknown) {
    if (error instanceof AnalyzerError) {
      process.stderr.write(`Error: ${error.message} (${error.code})\n`);
      return EXIT_FATAL;
    }
    throw error;
  }

  for (const scanError of result.scanErrors) {
    process.stderr.write(`Warning: Could not read ${scanError.file}: ${scanError.message} (${scanError.code})\n`);
  }

  // Format output
  const output =
    outputFormat === 'json'
      ? toJson(result, args.values.pretty === true, formatOptions)
      : toText(result, formatOptions);

  // Write output
  const outPath = args.values.out;
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }

  // Only the N+1 scan fails on warnings; the other reports are advisory.
  if (result.kind === 'n-plus-one' && result.summary.severityCounts.warning > 0) {
    return EXIT_ISSUES;
  }

  return EXIT_OK;
}

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({
    args: argv,
    options: {
      root: { type: 'string' },
      format: { type: 'string', default: 'text' },
      out: { type: 'string' },
      'no-timestamp': { type: 'boolean', default: false },
      pretty: { type: 'boolean', default: false },
      'findings-only': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = EXIT_FATAL;
    });
}
