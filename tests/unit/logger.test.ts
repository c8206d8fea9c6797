import { configureLoggerFromCli, logger } from '../../src/logger';

describe('logger', () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    logger.configure({ level: 'silent', timestamps: true });
  });

  it('should only write messages at or above the configured level', () => {
    logger.configure({ level: 'warn', timestamps: false });
    logger.debug('hidden debug');
    logger.info('hidden info');
    logger.warn('shown warning');
    logger.error('shown error');
    expect(written).toEqual(['shown warning\n', 'shown error\n']);
  });

  it('should prefix messages with a timestamp and the level', () => {
    logger.configure({ level: 'info', timestamps: true });
    logger.info('compiled');
    expect(written).toHaveLength(1);
    expect(written[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[info\] compiled\n$/);
  });

  it('should mark successes', () => {
    logger.configure({ level: 'info', timestamps: false });
    logger.success('done');
    expect(written).toEqual(['✔ done\n']);
  });

  it('should read the level from the environment', () => {
    process.env.STAGECRAFT_LOG_LEVEL = 'verbose';
    logger.configure();
    expect(logger.getLevel()).toBe('verbose');

    process.env.STAGECRAFT_LOG_LEVEL = 'not-a-level';
    logger.configure();
    expect(logger.getLevel()).toBe('info');
  });

  it('should map CLI flags to levels', () => {
    configureLoggerFromCli({ quiet: true });
    expect(logger.getLevel()).toBe('warn');

    configureLoggerFromCli({ verbose: true });
    expect(logger.getLevel()).toBe('verbose');

    configureLoggerFromCli({ debug: true });
    expect(logger.getLevel()).toBe('debug');
    expect(process.env.STAGECRAFT_DEBUG).toBe('true');
  });
});
