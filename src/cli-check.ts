#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for tmpl-check.
 * Parses a template file and validates its trees against the check rules.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { CheckConfig, Diagnostic } from './check/index.js';
import {
  VALIDATION_RULES,
  loadConfig,
  createDefaultConfig,
  validateTemplates,
} from './check/index.js';
import { parse } from './parser/index.js';
import { createError, ParseError } from './types.js';
import type { TreeObserver, TreeSet } from './types.js';
import { formatError, readVersion } from './cli-shared.js';
import { enrichError, formatEnrichedError } from './cli-error-enrichment.js';

/**
 * Parsed command-line arguments for tmpl-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      /** Function names from --func */
      funcs: string[];
      /** Top-level tree name; null means the file's base name */
      name: string | null;
      verbose: boolean;
      dynamic: boolean;
      format: 'text' | 'json';
    }
  | { mode: 'help' }
  | { mode: 'version' };

type CheckArgs = Extract<ParsedCheckArgs, { mode: 'check' }>;

const HELP_TEXT = `tmpl-check - Validate {{ action }} templates

Usage: tmpl-check [options] <file>

Options:
  --func <name>   Accept a function name (repeatable, or comma-separated)
  --name <name>   Name of the top-level template (default: file name)
  --dynamic       Allow {{template (pipeline)}} names
  --format <fmt>  Output format: text (default) or json
  --verbose       Log template definitions to stderr
  -h, --help      Show this help message
  -v, --version   Show version number`;

/**
 * Take the value following a flag, rejecting a missing or flag-like value.
 */
function flagValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} requires an argument`);
  }
  return value;
}

/**
 * Parse command-line arguments for tmpl-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // --help and --version win in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const funcs: string[] = [];
  let name: string | null = null;
  let format: 'text' | 'json' = 'text';
  let verbose = false;
  let dynamic = false;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--func':
        funcs.push(
          ...flagValue(argv, i, arg)
            .split(',')
            .map((f) => f.trim())
            .filter((f) => f !== '')
        );
        i++;
        break;
      case '--name':
        name = flagValue(argv, i, arg);
        i++;
        break;
      case '--format': {
        const value = argv[i + 1];
        if (value === 'text' || value === 'json') {
          format = value;
        } else if (value === undefined || value.startsWith('-')) {
          throw new Error('--format requires argument: text or json');
        } else {
          throw new Error(`Invalid format: ${value}. Expected text or json`);
        }
        i++;
        break;
      }
      case '--verbose':
        verbose = true;
        break;
      case '--dynamic':
        dynamic = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        // First non-flag argument is the file
        file ??= arg;
    }
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, funcs, name, verbose, dynamic, format };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line:col: severity: message (code)
 * JSON format: errors array and summary; verbose adds each rule's category
 */
export function formatDiagnostics(
  file: string,
  diagnostics: Diagnostic[],
  format: 'text' | 'json',
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(file, diagnostics, verbose);
  }
  return formatDiagnosticsText(file, diagnostics);
}

function formatDiagnosticsText(
  file: string,
  diagnostics: Diagnostic[]
): string {
  return diagnostics
    .map((d) => {
      const { line, column } = d.location;
      return `${file}:${line}:${column}: ${d.severity}: ${d.message} (${d.code})`;
    })
    .join('\n');
}

function formatDiagnosticsJSON(
  file: string,
  diagnostics: Diagnostic[],
  verbose: boolean
): string {
  const categoryMap = new Map<string, string>();
  for (const rule of VALIDATION_RULES) {
    categoryMap.set(rule.code, rule.category);
  }

  const errors = diagnostics.map((d) => {
    const error: Record<string, unknown> = {
      location: {
        line: d.location.line,
        column: d.location.column,
        offset: d.location.offset,
      },
      severity: d.severity,
      code: d.code,
      message: d.message,
      context: d.context,
      tree: d.tree,
    };

    if (verbose) {
      const category = categoryMap.get(d.code);
      if (category) {
        error['category'] = category;
      }
    }

    return error;
  });

  const summary = {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };

  return JSON.stringify({ file, errors, summary }, null, 2);
}

/**
 * Convert a parse failure into a diagnostic coded by its error id.
 */
export function parseErrorDiagnostic(
  err: ParseError,
  source: string
): Diagnostic {
  const location = err.location ?? { line: err.line, column: 1, offset: 0 };
  return {
    location,
    severity: 'error',
    code: err.errorId,
    message: err.detail,
    context: source.split('\n')[location.line - 1]?.trim() ?? '',
    tree: err.treeName,
  };
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function verboseObserver(): TreeObserver {
  return {
    onTreeStart(name, id) {
      console.error(`parsing template "${name}" (tree ${id})`);
    },
    onTreeComplete(tree) {
      console.error(`defined template "${tree.name}"`);
    },
  };
}

/**
 * Read the template, exiting with code 2 when it cannot be read.
 */
function readTemplate(file: string): string {
  const report = (reason: string): never => {
    console.error(
      `Error: ${formatError(createError('TMPL-C002', { reason, path: file }))}`
    );
    process.exit(2);
  };

  if (!existsSync(file)) {
    return report('File not found');
  }
  try {
    if (statSync(file).isDirectory()) {
      return report('Path is a directory');
    }
    return readFileSync(file, 'utf-8');
  } catch {
    return report('Cannot read file');
  }
}

/**
 * Parse the template, reporting a parse error and exiting with code 3.
 */
function parseTemplate(
  args: CheckArgs,
  source: string,
  funcs: string[],
  config: CheckConfig
): TreeSet {
  try {
    return parse(args.name ?? basename(args.file), source, funcs, {
      dynamicTemplates: args.dynamic || config.dynamicTemplates === true,
      leftDelim: config.leftDelim,
      rightDelim: config.rightDelim,
      observer: args.verbose ? verboseObserver() : undefined,
    });
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    if (args.format === 'json') {
      console.log(
        formatDiagnostics(
          args.file,
          [parseErrorDiagnostic(err, source)],
          'json',
          args.verbose
        )
      );
    } else {
      console.error(formatEnrichedError(enrichError(err, source, funcs)));
    }
    return process.exit(3);
  }
}

/**
 * Main entry point for tmpl-check CLI.
 * Exit codes: 0 clean, 1 diagnostics or failure, 2 unreadable file, 3 parse error.
 */
async function main(): Promise<void> {
  try {
    const args = parseCheckArgs(process.argv.slice(2));

    if (args.mode === 'help') {
      console.log(HELP_TEXT);
      process.exit(0);
    }

    if (args.mode === 'version') {
      console.log(await readVersion());
      process.exit(0);
    }

    const config = loadConfig(process.cwd()) ?? createDefaultConfig();
    const source = readTemplate(args.file);
    const funcs = [...(config.funcs ?? []), ...args.funcs];

    const trees = parseTemplate(args, source, funcs, config);

    const diagnostics = validateTemplates(trees, source, config);

    if (diagnostics.length === 0) {
      if (args.format === 'json') {
        console.log(formatDiagnostics(args.file, [], 'json', args.verbose));
      } else {
        console.log('No issues found');
      }
      process.exit(0);
    }

    console.log(
      formatDiagnostics(args.file, diagnostics, args.format, args.verbose)
    );
    process.exit(1);
  } catch (err) {
    if (err instanceof Error) {
      console.error(`Error: ${formatError(err)}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(1);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(`Error: ${String(err)}`);
    process.exit(1);
  });
}
