/**
 * Subcommands understood by the stagecraft CLI
 */
export type CommandName = 'transpile' | 'check';

/**
 * CLI options parsed from command line arguments
 */
export interface CliOptions {
  /** Subcommand to run; unset when only help or version was requested */
  command?: CommandName;
  /** Workflow script to compile */
  source?: string;
  /** Workflow output path (`transpile` only) */
  output?: string;
  /** Print the workflow to stdout instead of writing files */
  stdout?: boolean;
  /** Write `<name>-parameters.yaml` beside the workflow (default: true) */
  paramsFile: boolean;
  /** Path to configuration file */
  configPath?: string;
  /** Enable debug mode for detailed output */
  debug?: boolean;
  /** Increase verbosity (more than info, less than debug) */
  verbose?: boolean;
  /** Reduce verbosity to warnings and errors */
  quiet?: boolean;
  /** Show help text */
  help?: boolean;
  /** Show version */
  version?: boolean;
}
