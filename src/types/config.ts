/**
 * Types for the stagecraft configuration file (`.stagecraft.yaml`)
 */

export interface ResourceSpec {
  cpu?: string;
  memory?: string;
}

/**
 * Fully resolved configuration, after defaults and environment overrides
 */
export interface StagecraftConfig {
  /** Default container image for step templates */
  image: string;
  /** Interpreter command that runs the embedded script */
  command: string[];
  /** Mount path of the shared emptyDir volume inside every step container */
  workdir: string;
  /** Prefix of `metadata.generateName` */
  generateNamePrefix: string;
  s3: {
    endpoint: string;
  };
  resources: {
    requests: Required<ResourceSpec>;
    limits: Required<ResourceSpec>;
  };
}

/**
 * Configuration as written by the user; every key is optional
 */
export interface StagecraftConfigFile {
  image?: string;
  command?: string[];
  workdir?: string;
  generateNamePrefix?: string;
  s3?: {
    endpoint?: string;
  };
  resources?: {
    requests?: ResourceSpec;
    limits?: ResourceSpec;
  };
}

export interface ConfigValidationError {
  /** Field that failed validation */
  field: string;
  message: string;
  value?: unknown;
}

export interface ConfigLoadOptions {
  /** Validate against the JSON schema (default: true) */
  validate?: boolean;
  /** Treat unknown keys as errors (default: false) */
  strict?: boolean;
}

export interface EnvironmentOverrides {
  image?: string;
  s3Endpoint?: string;
}
