/**
 * Convert command - linger stimulus file to ibex item list
 *
 * Usage:
 *   linger2ibex convert items.txt
 *   linger2ibex convert items.txt AcceptabilityJudgment
 *   linger2ibex convert items.txt --escape --output data.js
 */

import { Command, Option } from 'commander';
import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import {
  convert,
  createLogger,
  ConversionError,
  loadConfig,
  loadTemplate,
  FileAccessError,
  LOG_LEVELS,
  type LogLevel,
  type LogSink,
} from '@linger2ibex/core';
import { describeError, exitWithError } from '../utils/errorFormatter.js';

export interface ConvertOptions {
  config?: string;
  escape?: boolean;
  output?: string;
  logLevel?: LogLevel;
}

/**
 * Where the command reads from and writes to. Defaults to the process.
 */
export interface CommandIO {
  cwd: string;
  stdout: LogSink;
  stderr: LogSink;
}

const processIO: CommandIO = {
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function readInput(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    throw new FileAccessError(
      missing ? `Input file not found: ${filePath}` : `Cannot read input file: ${filePath}`,
      missing ? 'ERR_FILE_NOT_FOUND' : 'ERR_FILE_UNREADABLE',
      { filePath },
      'Check the path passed to linger2ibex convert'
    );
  }
}

/**
 * Run a conversion. Throws on any failure before anything is written.
 *
 * Precedence: positional stimulus type and flags, then the config file,
 * then the built-in defaults.
 */
export function runConvert(
  inputPath: string,
  stimulusType: string | undefined,
  options: ConvertOptions,
  io: CommandIO = processIO
): void {
  const bootLogger = createLogger(options.logLevel ?? 'warnings', io.stderr);
  const config = loadConfig(options.config, io.cwd, bootLogger);
  const logger = createLogger(options.logLevel ?? config.logLevel ?? 'errors', io.stderr);

  const filePath = resolve(io.cwd, inputPath);
  logger.info('Converting', { input: filePath });

  const text = readInput(filePath);
  let output: string;
  try {
    output = convert(text, {
      stimulusType: stimulusType ?? config.stimulusType,
      escapeStrings: options.escape ?? config.escapeStrings,
      template: config.template ? loadTemplate(config.template) : undefined,
      logger,
    });
  } catch (err) {
    // parsers know the line but not the file
    if (err instanceof ConversionError && err.context.filePath === undefined) {
      err.context.filePath = filePath;
    }
    throw err;
  }

  if (options.output) {
    const outputPath = resolve(io.cwd, options.output);
    writeFileSync(outputPath, output + '\n', 'utf-8');
    logger.info('Wrote output', { output: outputPath });
  } else {
    io.stdout(output + '\n');
  }
}

export const convertCommand = new Command('convert')
  .description('Convert a linger stimulus file into an ibex item list')
  .argument('<input-path>', 'Linger-format stimulus file')
  .argument('[stimulus-type]', 'Ibex controller for every item (default: DashedSentence)')
  .option('-c, --config <path>', 'Config file (default: ./linger2ibex.yaml if present)')
  .option('-e, --escape', 'Escape quotes and backslashes in sentences and questions')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .addOption(new Option('--log-level <level>', 'Log verbosity on stderr').choices(LOG_LEVELS))
  .addHelpText('after', `
Examples:
  linger2ibex convert items.txt                          Print DashedSentence items
  linger2ibex convert items.txt DashedSentenceQ          Use another controller
  linger2ibex convert items.txt -e -o data_includes.js   Escape text, write to a file
`)
  .action((inputPath: string, stimulusType: string | undefined, options: ConvertOptions) => {
    try {
      runConvert(inputPath, stimulusType, options);
    } catch (err) {
      const { title, nextSteps } = describeError(err);
      exitWithError(title, nextSteps);
    }
  });
