#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { CLI } from './cli';
import { formatDiagnostic } from './errors';
import { configureLoggerFromCli, logger } from './logger';
import { loadConfigFor, transpileFile, transpileSource, workflowNameOf } from './transpiler';
import type { CliOptions } from './types/cli';

/**
 * Run the CLI with the given arguments (without the node and script entries) and return the
 * process exit code. Diagnostics go to stderr; nothing is written when compilation fails.
 */
export async function run(argv: string[]): Promise<number> {
  const cli = new CLI();

  let options: CliOptions;
  try {
    options = cli.parseArgs(argv);
  } catch (error: unknown) {
    // commander has already printed its own message
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    console.error(formatDiagnostic(error));
    return 1;
  }

  // commander printed help or version while parsing
  if (options.help || options.version || !options.command || !options.source) {
    return 0;
  }

  configureLoggerFromCli({
    debug: options.debug,
    verbose: options.verbose,
    quiet: options.quiet,
  });

  try {
    switch (options.command) {
      case 'check':
        await handleCheckCommand(options.source, options);
        break;
      case 'transpile':
        await handleTranspileCommand(options.source, options);
        break;
    }
    return 0;
  } catch (error: unknown) {
    console.error(formatDiagnostic(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
}

/**
 * Compile the script and report the result without writing any file
 */
async function handleCheckCommand(source: string, options: CliOptions): Promise<void> {
  const { workflow } = await compileFromDisk(source, options);
  logger.success(
    `${source}: ${workflow.stageGraph.steps.length} step(s) in ${workflow.stageGraph.stages.length} stage(s)`
  );
}

async function handleTranspileCommand(source: string, options: CliOptions): Promise<void> {
  if (options.stdout) {
    const { yaml } = await compileFromDisk(source, options);
    process.stdout.write(yaml);
    return;
  }

  logger.debug(`Transpiling ${source}`);
  await transpileFile(source, {
    outputPath: options.output,
    writeParametersFile: options.paramsFile,
    configPath: options.configPath,
  });
}

async function compileFromDisk(source: string, options: CliOptions) {
  const resolved = path.resolve(source);
  const text = await fs.promises.readFile(resolved, 'utf8');
  const config = await loadConfigFor(resolved, options.configPath);
  return transpileSource(text, {
    fileName: path.relative(process.cwd(), resolved) || resolved,
    name: workflowNameOf(resolved),
    config,
  });
}

export async function main(): Promise<void> {
  const exitCode = await run(process.argv.slice(2));
  process.exit(exitCode);
}

// If called directly, run main
if (require.main === module) {
  main().catch(error => {
    console.error(formatDiagnostic(error));
    process.exit(1);
  });
}
