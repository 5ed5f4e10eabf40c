import { Command, CommanderError } from 'commander';
import { DocumentConverter } from '../core/converter.js';
import { EXIT_CODES, evaluateExitStatus, type ExitCode } from '../core/exitStatus.js';
import { atomicWriteFile } from '../fs/atomicWriter.js';
import { readInputFile } from '../fs/inputReader.js';
import { PrettierFormatter, type MarkdownFormatter } from '../transform/markdownFormatter.js';
import { logger } from '../util/logger.js';
import { loadConfig, type CLIOptions, type LoadContext } from './configLoader.js';

export const VERSION = '0.1.0';

export interface RunContext extends LoadContext {
  /** Replaces prettier when formatting is enabled. */
  formatter?: MarkdownFormatter;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(context: RunContext = {}): Command {
  const program = new Command();

  program
    .name('doc2md')
    .description('Convert an HTML export of a word-processor document to Markdown')
    .version(VERSION)
    .argument('<input>', 'HTML file to convert')
    .argument('<output>', 'Markdown file to write')
    .option('-v, --verbose', 'Increase log verbosity (repeat for debug output)', increaseVerbosity, 0)
    .option('--no-format', 'Skip the prettier formatting pass')
    .option('-c, --config <file>', `YAML configuration file (default: ./.doc2md.yaml when present)`)
    .option('--log-format <format>', 'Log format: human, json')
    .exitOverride();

  if (context.writeOut || context.writeErr) {
    program.configureOutput({
      writeOut: context.writeOut ?? (text => process.stdout.write(text)),
      writeErr: context.writeErr ?? (text => process.stderr.write(text)),
    });
  }

  return program;
}

async function convertFile(inputPath: string, outputPath: string, options: CLIOptions, context: RunContext): Promise<void> {
  const config = await loadConfig(inputPath, outputPath, options, context);
  logger.setLevel(config.logLevel);
  logger.setFormat(config.logFormat);

  let formatter: MarkdownFormatter | null = null;
  if (config.format) {
    formatter = context.formatter ?? new PrettierFormatter(config.formatter);
  }

  const html = await readInputFile(config.inputPath);
  const converter = new DocumentConverter({ ...config.conversion, formatter });
  const result = await converter.convert(html, config.inputPath);

  await atomicWriteFile(config.outputPath, result.markdown);
  logger.info('Markdown written', {
    path: config.outputPath,
    ...result.stats,
    caveats: result.caveats.length,
  });
}

/**
 * Parses `args` (without the node and script entries), runs one conversion
 * and returns the exit code. Never exits the process itself.
 */
export async function runCli(args: string[], context: RunContext = {}): Promise<ExitCode> {
  const program = createProgram(context);
  const parsed: { paths: [string, string] | null } = { paths: null };
  program.action((input: string, output: string) => {
    parsed.paths = [input, output];
  });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version end with exit code 0; everything else is a usage error
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_USAGE;
    }
    throw error;
  }

  if (parsed.paths === null) {
    return EXIT_CODES.INVALID_USAGE;
  }
  const [inputPath, outputPath] = parsed.paths;
  const options = program.opts<CLIOptions>();

  try {
    await convertFile(inputPath, outputPath, options, context);
  } catch (error) {
    const status = evaluateExitStatus(error);
    logger.error(status.message, { category: status.category, exitCode: status.code });
    return status.code;
  }
  return EXIT_CODES.SUCCESS;
}
