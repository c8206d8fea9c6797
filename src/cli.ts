import { Command, CommanderError } from 'commander';
import { CliOptions, CommandName } from './types/cli';
import * as fs from 'fs';
import * as path from 'path';

/**
 * CLI argument parser
 */
export class CLI {
  /**
   * Parse command line arguments (without the node and script entries). Help and version
   * requests come back as flags instead of exiting the process.
   */
  public parseArgs(argv: string[]): CliOptions {
    const result: { parsed?: CliOptions } = {};
    const program = this.createProgram((command, source, output, options) => {
      result.parsed = this.toCliOptions(command, source, output, options);
    });

    try {
      program.parse(argv, { from: 'user' });
    } catch (error: unknown) {
      // Handle commander.js exit overrides for help/version ONLY
      if (error instanceof CommanderError) {
        if (error.code === 'commander.helpDisplayed') {
          return { paramsFile: true, help: true };
        }
        if (error.code === 'commander.version') {
          return { paramsFile: true, version: true };
        }
        if (error.code === 'commander.help') {
          throw new Error(`Missing command. Available commands: transpile, check`);
        }
      }
      throw error;
    }

    const { parsed } = result;
    if (!parsed) {
      throw new Error(`Missing command. Available commands: transpile, check`);
    }
    this.validateOptions(parsed);
    return parsed;
  }

  /**
   * Get help text
   */
  public getHelpText(): string {
    return this.createProgram(() => undefined).helpInformation() + this.getExamplesText();
  }

  /**
   * Get version from package.json
   */
  public getVersion(): string {
    // First, try environment variable (set during build/publish)
    if (process.env.STAGECRAFT_VERSION) {
      return process.env.STAGECRAFT_VERSION;
    }

    const possiblePaths = [
      path.join(__dirname, '../package.json'), // Development (src/) and build (dist/)
      path.join(process.cwd(), 'package.json'),
    ];

    for (const packageJsonPath of possiblePaths) {
      if (!fs.existsSync(packageJsonPath)) continue;
      try {
        const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
        if (
          packageJson &&
          typeof packageJson === 'object' &&
          'name' in packageJson &&
          'version' in packageJson &&
          packageJson.name === 'stagecraft' &&
          typeof packageJson.version === 'string'
        ) {
          return packageJson.version;
        }
      } catch {
        // Try next path
      }
    }

    return '0.1.0';
  }

  /**
   * Get examples text for help
   */
  public getExamplesText(): string {
    return `
Examples:
  stagecraft transpile examples/multi-step.ts                 # Writes examples/multi-step.yaml
  stagecraft transpile pipeline.ts build/pipeline.yaml --no-params-file
  stagecraft transpile pipeline.ts --stdout | argo submit -
  stagecraft check pipeline.ts --config ./.stagecraft.yaml
  stagecraft transpile pipeline.ts --debug                    # Log every compilation phase`;
  }

  private createProgram(
    onCommand: (
      command: CommandName,
      source: string,
      output: string | undefined,
      options: Record<string, unknown>
    ) => void
  ): Command {
    const program = new Command();
    program
      .name('stagecraft')
      .description('Compile annotated TypeScript workflow scripts into Argo Workflows')
      .version(this.getVersion())
      .addHelpText('after', this.getExamplesText())
      .exitOverride(); // Prevent process.exit; subcommands inherit this

    const transpile = program
      .command('transpile')
      .description('Compile a workflow script and write the workflow YAML')
      .argument('<source>', 'Workflow script (.ts)')
      .argument('[output]', 'Workflow output path (default: <script dir>/<script name>.yaml)')
      .option('--stdout', 'Print the workflow to stdout instead of writing files')
      .option('--no-params-file', 'Do not write the <name>-parameters.yaml file');
    this.addSharedOptions(transpile).action(
      (source: string, output: string | undefined, options: Record<string, unknown>) =>
        onCommand('transpile', source, output, options)
    );

    const check = program
      .command('check')
      .description('Compile a workflow script and report problems without writing anything')
      .argument('<source>', 'Workflow script (.ts)');
    this.addSharedOptions(check).action((source: string, options: Record<string, unknown>) =>
      onCommand('check', source, undefined, options)
    );

    return program;
  }

  private addSharedOptions(command: Command): Command {
    return command
      .option('--config <path>', 'Path to configuration file')
      .option('--debug', 'Enable debug mode for detailed output')
      .option('-v, --verbose', 'Increase verbosity (without full debug)')
      .option('-q, --quiet', 'Reduce verbosity to warnings and errors')
      .allowExcessArguments(false);
  }

  private toCliOptions(
    command: CommandName,
    source: string,
    output: string | undefined,
    options: Record<string, unknown>
  ): CliOptions {
    return {
      command,
      source,
      output,
      stdout: options.stdout === true,
      paramsFile: options.paramsFile !== false,
      configPath: typeof options.config === 'string' ? options.config : undefined,
      debug: options.debug === true,
      verbose: options.verbose === true,
      quiet: options.quiet === true,
    };
  }

  /**
   * Validate parsed options
   */
  private validateOptions(options: CliOptions): void {
    if (options.source && !/\.(m|c)?ts$/.test(options.source)) {
      throw new Error(`Invalid source file: ${options.source}. Expected a TypeScript (.ts) file`);
    }
    if (options.stdout && options.output) {
      throw new Error('Use either an output path or --stdout, not both');
    }
    if (options.verbose && options.quiet) {
      throw new Error('--verbose and --quiet cannot be combined');
    }
  }
}
