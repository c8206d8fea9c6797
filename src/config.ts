import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import configSchema from './config-schema.json';
import {
  StagecraftConfig,
  StagecraftConfigFile,
  ConfigValidationError,
  ConfigLoadOptions,
  EnvironmentOverrides,
} from './types/config';

/**
 * File names looked up, in order, when no explicit `--config` is given
 */
export const CONFIG_FILE_NAMES: readonly string[] = [
  '.stagecraft.yaml',
  '.stagecraft.yml',
  'stagecraft.yaml',
  'stagecraft.yml',
];

/**
 * Configuration manager for stagecraft
 */
export class ConfigManager {
  /**
   * Load configuration from a file
   */
  public async loadConfig(
    configPath: string,
    options: ConfigLoadOptions = {}
  ): Promise<StagecraftConfig> {
    const { validate = true, strict = false } = options;

    const resolvedPath = path.isAbsolute(configPath)
      ? configPath
      : path.resolve(process.cwd(), configPath);

    let configContent: string;
    try {
      configContent = fs.readFileSync(resolvedPath, 'utf8');
    } catch (readErr: unknown) {
      const code = readErr instanceof Error && 'code' in readErr ? readErr.code : undefined;
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
      }
      const message = readErr instanceof Error ? readErr.message : String(readErr);
      throw new Error(`Failed to read configuration file ${resolvedPath}: ${message}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(configContent);
    } catch (yamlError) {
      const errorMessage = yamlError instanceof Error ? yamlError.message : String(yamlError);
      throw new Error(`Invalid YAML syntax in ${resolvedPath}: ${errorMessage}`);
    }

    // An empty file is a valid, empty configuration
    const loaded: unknown = parsed ?? {};
    if (loaded === null || typeof loaded !== 'object' || Array.isArray(loaded)) {
      throw new Error('Configuration file must contain a valid YAML object');
    }

    const fileConfig = validate ? this.validateConfig(loaded, strict) : this.coerce(loaded);
    logger.debug(`Loaded configuration from ${resolvedPath}`);
    return this.applyEnvironmentOverrides(this.mergeWithDefaults(fileConfig));
  }

  /**
   * Find and load configuration from default locations: the script's directory first, then
   * the current working directory. Falls back to defaults when nothing is found.
   */
  public async findAndLoadConfig(
    searchDirs: string[] = [process.cwd()],
    options: ConfigLoadOptions = {}
  ): Promise<StagecraftConfig> {
    const seen = new Set<string>();
    for (const baseDir of searchDirs) {
      const dir = path.resolve(baseDir);
      if (seen.has(dir)) continue;
      seen.add(dir);

      for (const candidate of CONFIG_FILE_NAMES.map(name => path.join(dir, name))) {
        if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
          return this.loadConfig(candidate, options);
        }
      }
    }

    logger.debug('No configuration file found, using defaults');
    return this.getDefaultConfig();
  }

  /**
   * Get default configuration
   */
  public getDefaultConfig(): StagecraftConfig {
    return this.applyEnvironmentOverrides(this.mergeWithDefaults({}));
  }

  /**
   * Read overrides from the environment (`STAGECRAFT_IMAGE`, `STAGECRAFT_S3_ENDPOINT`)
   */
  public getEnvironmentOverrides(): EnvironmentOverrides {
    const overrides: EnvironmentOverrides = {};
    if (process.env.STAGECRAFT_IMAGE) {
      overrides.image = process.env.STAGECRAFT_IMAGE;
    }
    if (process.env.STAGECRAFT_S3_ENDPOINT) {
      overrides.s3Endpoint = process.env.STAGECRAFT_S3_ENDPOINT;
    }
    return overrides;
  }

  /**
   * Validate configuration against the JSON schema
   * @param strict If true, treat unknown keys as errors
   */
  public validateConfig(config: object, strict = false): StagecraftConfigFile {
    const errors: ConfigValidationError[] = [];
    const warnings: ConfigValidationError[] = [];

    const validators = getValidators();
    if (!validators.report(config)) {
      for (const e of validators.report.errors ?? []) {
        const issue = describeAjvError(e);
        if (e.keyword === 'additionalProperties') {
          warnings.push(issue);
        } else {
          errors.push(issue);
        }
      }
    }

    if (strict && warnings.length > 0) {
      errors.push(...warnings);
    }

    if (errors.length > 0) {
      throw new Error(`Invalid configuration [${errors[0].field}]: ${errors[0].message}`);
    }

    for (const w of warnings) {
      logger.warn(`⚠️  Config warning [${w.field}]: ${w.message}`);
    }

    return this.coerce(config);
  }

  /**
   * Drop unknown keys so the value matches the config file shape
   */
  private coerce(config: object): StagecraftConfigFile {
    const copy: unknown = JSON.parse(JSON.stringify(config));
    const validators = getValidators();
    if (!validators.prune(copy)) {
      const first = validators.prune.errors?.[0];
      throw new Error(
        `Invalid configuration: ${first ? describeAjvError(first).message : 'unknown error'}`
      );
    }
    return copy;
  }

  /**
   * Merge configuration with default values
   */
  private mergeWithDefaults(config: StagecraftConfigFile): StagecraftConfig {
    const defaultConfig = createDefaultConfig();

    return {
      image: config.image ?? defaultConfig.image,
      command: config.command ?? defaultConfig.command,
      workdir: (config.workdir ?? defaultConfig.workdir).replace(/\/+$/, '') || '/',
      generateNamePrefix: config.generateNamePrefix ?? defaultConfig.generateNamePrefix,
      s3: {
        endpoint: config.s3?.endpoint ?? defaultConfig.s3.endpoint,
      },
      resources: {
        requests: { ...defaultConfig.resources.requests, ...config.resources?.requests },
        limits: { ...defaultConfig.resources.limits, ...config.resources?.limits },
      },
    };
  }

  private applyEnvironmentOverrides(config: StagecraftConfig): StagecraftConfig {
    const overrides = this.getEnvironmentOverrides();
    return {
      ...config,
      image: overrides.image ?? config.image,
      s3: { endpoint: overrides.s3Endpoint ?? config.s3.endpoint },
    };
  }
}

export function createDefaultConfig(): StagecraftConfig {
  return {
    image: 'node:20-alpine',
    command: ['node'],
    workdir: '/workdir',
    generateNamePrefix: 'stagecraft-',
    s3: {
      endpoint: 's3.amazonaws.com',
    },
    resources: {
      requests: { cpu: '20m', memory: '30Mi' },
      limits: { cpu: '20m', memory: '30Mi' },
    },
  };
}

function describeAjvError(e: ErrorObject): ConfigValidationError {
  const pathStr = e.instancePath ? e.instancePath.replace(/^\//, '').replace(/\//g, '.') : '';
  if (e.keyword === 'additionalProperties') {
    const extra: unknown = e.params.additionalProperty;
    const key = typeof extra === 'string' ? extra : 'unknown';
    return {
      field: pathStr ? `${pathStr}.${key}` : key,
      message: pathStr
        ? `Unknown key '${key}' will be ignored`
        : `Unknown top-level key '${key}' will be ignored.`,
    };
  }
  return {
    field: pathStr || 'config',
    message: e.message ?? 'Invalid configuration',
  };
}

interface ConfigValidators {
  /** Reports every issue, unknown keys included */
  report: ValidateFunction<StagecraftConfigFile>;
  /** Removes unknown keys in place */
  prune: ValidateFunction<StagecraftConfigFile>;
}

// Cache compiled validators across loads
let __validators: ConfigValidators | null = null;

function getValidators(): ConfigValidators {
  if (!__validators) {
    const reporting = new Ajv({ allErrors: true, allowUnionTypes: true, strict: false });
    const pruning = new Ajv({ removeAdditional: 'all', allowUnionTypes: true, strict: false });
    __validators = {
      report: reporting.compile<StagecraftConfigFile>(configSchema),
      prune: pruning.compile<StagecraftConfigFile>(configSchema),
    };
  }
  return __validators;
}
