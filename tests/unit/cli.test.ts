import { CLI } from '../../src/cli';

describe('CLI', () => {
  let cli: CLI;

  beforeEach(() => {
    cli = new CLI();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.STAGECRAFT_VERSION;
  });

  describe('parseArgs', () => {
    it('should parse a transpile command with defaults', () => {
      expect(cli.parseArgs(['transpile', 'flow.ts'])).toEqual({
        command: 'transpile',
        source: 'flow.ts',
        output: undefined,
        stdout: false,
        paramsFile: true,
        configPath: undefined,
        debug: false,
        verbose: false,
        quiet: false,
      });
    });

    it('should take an output path and skip the parameters file', () => {
      const options = cli.parseArgs(['transpile', 'flow.ts', 'build/flow.yaml', '--no-params-file']);
      expect(options.output).toBe('build/flow.yaml');
      expect(options.paramsFile).toBe(false);
    });

    it('should parse --stdout', () => {
      expect(cli.parseArgs(['transpile', 'flow.ts', '--stdout']).stdout).toBe(true);
    });

    it('should parse check with shared options', () => {
      const options = cli.parseArgs(['check', 'flow.ts', '--config', 'ci.yaml', '-v']);
      expect(options.command).toBe('check');
      expect(options.configPath).toBe('ci.yaml');
      expect(options.verbose).toBe(true);
      expect(options.output).toBeUndefined();
    });

    it('should reject a source that is not a TypeScript file', () => {
      expect(() => cli.parseArgs(['transpile', 'flow.py'])).toThrow(
        'Invalid source file: flow.py. Expected a TypeScript (.ts) file'
      );
    });

    it('should reject an output path together with --stdout', () => {
      expect(() => cli.parseArgs(['transpile', 'flow.ts', 'out.yaml', '--stdout'])).toThrow(
        'Use either an output path or --stdout, not both'
      );
    });

    it('should reject --verbose with --quiet', () => {
      expect(() => cli.parseArgs(['check', 'flow.ts', '--verbose', '--quiet'])).toThrow(
        '--verbose and --quiet cannot be combined'
      );
    });

    it('should report a version request instead of exiting', () => {
      jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
      expect(cli.parseArgs(['--version'])).toEqual({ paramsFile: true, version: true });
    });
  });

  describe('getVersion', () => {
    it('should prefer the version from the environment', () => {
      process.env.STAGECRAFT_VERSION = '9.9.9';
      expect(cli.getVersion()).toBe('9.9.9');
    });

    it('should read the version from package.json', () => {
      expect(cli.getVersion()).toBe('0.1.0');
    });
  });

  it('should list examples in the help text', () => {
    const help = cli.getHelpText();
    expect(help).toContain('Usage: stagecraft [options] [command]');
    expect(help).toContain('stagecraft transpile pipeline.ts --stdout | argo submit -');
  });
});
