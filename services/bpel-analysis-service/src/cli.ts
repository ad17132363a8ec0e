#!/usr/bin/env node
/**
 * bpel-prd command line
 *
 *   bpel-prd batch [root]         analyse a whole workspace
 *   bpel-prd analyze <file>       analyse one BPEL file
 *   bpel-prd validate <files...>  check summaries (and their PRDs)
 *
 * Exit codes: 0 success, 1 analysis or I/O error, 2 gaps at or above --fail-on.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { analyzeBpel, validateSummary } from './services/analysis';
import { analyzeWorkspace, gapsAtOrAbove, outputName, readSources, writeOutputs } from './services/workspace';
import { checkCompleteness } from './render/completeness';
import { isAnalysisError } from './errors';
import { Gap, RiskLevel } from './types/summary';
import { createLogger, Logger } from '../../../shared/utils';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  GAPS: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
};

/**
 * Helper to collect multiple option values into an array.
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function parseRisk(value: string): RiskLevel {
  const parsed = RiskLevel.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError('Expected one of: low, medium, high');
  }
  return parsed.data;
}

function gapCounts(gaps: Gap[]): string {
  const count = (risk: RiskLevel) => gaps.filter(g => g.risk === risk).length;
  return `${gaps.length} gaps (${count('high')} high, ${count('medium')} medium, ${count('low')} low)`;
}

function errorMessage(error: unknown): string {
  if (isAnalysisError(error)) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

interface BatchOptions {
  out?: string;
  failOn?: RiskLevel;
  quiet?: boolean;
  enrich?: boolean;
}

interface AnalyzeOptions {
  wsdl: string[];
  xsd: string[];
  out?: string;
  json?: boolean;
  enrich?: boolean;
  failOn?: RiskLevel;
}

interface ValidateOptions {
  prdDir?: string;
}

// ============================================================================
// Commands
// ============================================================================

async function runBatch(root: string, options: BatchOptions, io: CliIo, logger: Logger): Promise<ExitCode> {
  const report = await analyzeWorkspace({ root, outDir: options.out, enrich: options.enrich, logger });

  if (report.results.length === 0) {
    io.err(chalk.yellow(`No BPEL files found under ${path.join(root, 'bpel')}`));
    return EXIT_CODES.ERROR;
  }

  for (const result of report.results) {
    const name = path.basename(result.bpelFile);
    if (result.error) {
      io.err(chalk.red(`✗ ${name}: ${result.error.code}: ${result.error.message}`));
    } else if (!options.quiet) {
      const incomplete = result.complete ? '' : chalk.yellow(' (completeness check failed)');
      io.out(`${chalk.green('✓')} ${name}: ${gapCounts(result.gaps)}${incomplete}`);
    }
  }

  if (!options.quiet) {
    io.out(chalk.bold(`\n${report.results.length - report.failed}/${report.results.length} processes analysed`));
  }

  if (report.failed > 0) return EXIT_CODES.ERROR;
  if (options.failOn) {
    const risk = options.failOn;
    const blocking = report.results.flatMap(r => gapsAtOrAbove(r.gaps, risk));
    if (blocking.length > 0) {
      io.err(chalk.red(`${blocking.length} gaps at or above ${risk} risk`));
      return EXIT_CODES.GAPS;
    }
  }
  return EXIT_CODES.SUCCESS;
}

async function runAnalyze(file: string, options: AnalyzeOptions, io: CliIo, logger: Logger): Promise<ExitCode> {
  const [bpel, wsdl, xsd] = await Promise.all([readFile(file, 'utf8'), readSources(options.wsdl), readSources(options.xsd)]);
  const result = await analyzeBpel({ fileName: path.basename(file), bpel, wsdl, xsd, enrich: options.enrich }, logger);

  if (options.out) {
    const written = await writeOutputs(options.out, outputName(file), result);
    io.err(chalk.green(`✓ ${written.prdPath}`));
    io.err(chalk.green(`✓ ${written.summaryPath}`));
  }
  if (options.json) {
    io.out(JSON.stringify(result.summary, null, 2));
  } else if (!options.out) {
    io.out(result.prd);
  }

  if (options.failOn && gapsAtOrAbove(result.summary.gaps, options.failOn).length > 0) {
    io.err(chalk.red(`${gapCounts(result.summary.gaps)}; failing on ${options.failOn} risk`));
    return EXIT_CODES.GAPS;
  }
  return EXIT_CODES.SUCCESS;
}

async function runValidate(files: string[], options: ValidateOptions, io: CliIo): Promise<ExitCode> {
  let failures = 0;

  for (const file of files) {
    const name = path.basename(file);
    try {
      const candidate: unknown = JSON.parse(await readFile(file, 'utf8'));
      const summary = validateSummary(candidate, name);

      if (options.prdDir) {
        const prdPath = path.join(options.prdDir, `${path.basename(file, '.json')}.md`);
        const report = checkCompleteness(summary, await readFile(prdPath, 'utf8'));
        const failed = report.checks.filter(c => !c.passed);
        if (failed.length > 0) {
          failures++;
          io.err(chalk.red(`✗ ${name}: PRD incomplete`));
          for (const check of failed) {
            io.err(`  ${check.description}: missing ${check.missing.join(', ')}`);
          }
          continue;
        }
      }
      io.out(`${chalk.green('✓')} ${name}`);
    } catch (error) {
      failures++;
      io.err(chalk.red(`✗ ${name}: ${errorMessage(error)}`));
    }
  }

  return failures > 0 ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS;
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(io: CliIo, onExit: (code: ExitCode) => void): Command {
  const logger = createLogger('bpel-prd', process.env.LOG_LEVEL ? undefined : 'warn');
  const guard = async (action: () => Promise<ExitCode>) => {
    try {
      onExit(await action());
    } catch (error) {
      io.err(chalk.red(`✗ ${errorMessage(error)}`));
      onExit(EXIT_CODES.ERROR);
    }
  };

  const program = new Command('bpel-prd')
    .description('Extract requirements documents from BPEL processes')
    .configureOutput({
      writeOut: text => io.out(text.trimEnd()),
      writeErr: text => io.err(text.trimEnd()),
    })
    .exitOverride();

  program
    .command('batch')
    .description('Analyse bpel/*.bpel with the shared wsdl/ and xsd/ files of a workspace')
    .argument('[root]', 'Workspace root', '.')
    .option('-o, --out <dir>', 'Output directory for prds/ and summaries/ (default: the workspace root)')
    .option('--fail-on <risk>', 'Exit with code 2 when gaps at or above this risk exist', parseRisk)
    .option('-q, --quiet', 'Only print errors')
    .option('--enrich', 'Add an AI-drafted overview (needs ANTHROPIC_API_KEY)')
    .action((root: string, options: BatchOptions) => guard(() => runBatch(root, options, io, logger)));

  program
    .command('analyze')
    .description('Analyse a single BPEL file')
    .argument('<file>', 'BPEL file')
    .option('--wsdl <file>', 'WSDL file (repeatable)', collect, [])
    .option('--xsd <file>', 'XSD file (repeatable)', collect, [])
    .option('-o, --out <dir>', 'Write prds/ and summaries/ under this directory')
    .option('--json', 'Print the JSON summary instead of the PRD')
    .option('--fail-on <risk>', 'Exit with code 2 when gaps at or above this risk exist', parseRisk)
    .option('--enrich', 'Add an AI-drafted overview (needs ANTHROPIC_API_KEY)')
    .action((file: string, options: AnalyzeOptions) => guard(() => runAnalyze(file, options, io, logger)));

  program
    .command('validate')
    .description('Validate summary files against the schema')
    .argument('<files...>', 'Summary JSON files')
    .option('--prd-dir <dir>', 'Also check <dir>/<name>.md for completeness')
    .action((files: string[], options: ValidateOptions) => guard(() => runValidate(files, options, io)));

  return program;
}

export async function run(argv: string[], io: CliIo = consoleIo): Promise<ExitCode> {
  const state: { exitCode: ExitCode } = { exitCode: EXIT_CODES.SUCCESS };
  const program = createProgram(io, code => {
    state.exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
    }
    throw error;
  }
  return state.exitCode;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(chalk.red(errorMessage(error)));
      process.exitCode = EXIT_CODES.ERROR;
    });
}
