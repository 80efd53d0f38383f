#!/usr/bin/env node

/**
 * Indicators CLI
 *
 * Analyze indicator exports from the command line.
 *
 * Usage:
 *   indicators analyze <file> [--format markdown|json] [--strict]
 *   indicators summary <file> [--format markdown|json]
 *   indicators help [command]
 */

import { loadAnalysisConfig } from './config/analysis-config.js';
import type { AnalysisConfig } from './config/analysis-config.js';
import { resolveConfigPath } from './config/paths.js';
import { runAnalyze, runSummary, parseFormat } from './commands/analyze.js';
import type { AnalyzeCommandOptions } from './commands/analyze.js';

// ─── Argument Parsing ───────────────────────────────────────

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['strict']);

interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let start = 1;

  // "help analyze" → "help-analyze"
  if (command === 'help' && args[1] && !args[1].startsWith('--')) {
    command = `help-${args[1]}`;
    start = 2;
  }

  const positionals: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = start; i < args.length; i++) {
    const arg = args[i]!;
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const key = arg.slice(2);
    if (!BOOLEAN_FLAGS.has(key) && i + 1 < args.length && !args[i + 1]!.startsWith('--')) {
      flags[key] = args[++i]!;
    } else {
      flags[key] = '';
    }
  }

  return { command, positionals, flags };
}

// ─── Commands ───────────────────────────────────────────────

function commandOptions(flags: Record<string, string>): AnalyzeCommandOptions {
  return {
    format: parseFormat(flags['format']),
    strict: 'strict' in flags,
  };
}

function requireFile(command: string, positionals: string[]): string {
  const file = positionals[0];
  if (!file) {
    throw new Error(`Missing indicator file. Usage: indicators ${command} <file>`);
  }
  return file;
}

function loadConfig(flags: Record<string, string>): AnalysisConfig {
  const configPath = flags['config'] || resolveConfigPath();
  const config = loadAnalysisConfig(configPath);
  if (config.source) {
    console.error(`[indicators] Using config ${config.source}`);
  }
  return config;
}

// ─── Help ───────────────────────────────────────────────────

function showHelp(topic?: string): string {
  if (topic && COMMAND_HELP[topic]) {
    return COMMAND_HELP[topic];
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `Indicators CLI - Management Indicator Analysis

Usage:
  indicators <command> <file> [options]
  indicators help <command>

Commands:
  analyze           Full report — periodicity, trend, status, anomalies, interpretation
  summary           Counts by status, trend and periodicity
  help [command]    Show help for a specific command

Global Options:
  --config <path>   Config file (default: ./indicators.config.json)

Examples:
  indicators analyze indicators.json               Markdown report
  indicators analyze indicators.json --format json Machine-readable results
  indicators summary indicators.json               Status overview
  indicators help analyze                          Detailed help for analyze

Environment Variables:
  INDICATORS_CONFIG   Config file path (overridden by --config)`;

const COMMAND_HELP: Record<string, string> = {
  analyze: `indicators analyze — Analyze Every Indicator in a File

  Read a JSON indicator export and run the analysis engine over each
  indicator. Malformed indicators are skipped and listed at the end of the
  report unless --strict is given.

  Usage:
    indicators analyze <file> [options]

  Options:
    --format <markdown|json>  Output format (default: markdown)
    --strict                  Abort on the first malformed indicator
    --config <path>           Config file with threshold overrides

  Report sections:
    Summary                 Counts per status, satisfactory share, anomalies
    Overview                One row per indicator, worst status first
    Indicator Details       Interpretation, statistics and anomalies
    Skipped Indicators      Indicators rejected for invalid data

  Examples:
    indicators analyze indicators.json
    indicators analyze indicators.json --format json
    indicators analyze indicators.json --strict`,

  summary: `indicators summary — Status Overview

  Analyze a file and print only the counts per status, trend and periodicity.

  Usage:
    indicators summary <file> [options]

  Options:
    --format <markdown|json>  Output format (default: markdown)
    --strict                  Abort on the first malformed indicator
    --config <path>           Config file with threshold overrides

  Examples:
    indicators summary indicators.json
    indicators summary indicators.json --format json`,

  help: `indicators help — Show Help

  Usage:
    indicators help [command]

  Examples:
    indicators help
    indicators help analyze`,
};

// ─── Main ───────────────────────────────────────────────────

function main() {
  const { command, positionals, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'analyze':
        output = runAnalyze(
          requireFile(command, positionals),
          loadConfig(flags),
          commandOptions(flags)
        );
        break;
      case 'summary':
        output = runSummary(
          requireFile(command, positionals),
          loadConfig(flags),
          commandOptions(flags)
        );
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main();
