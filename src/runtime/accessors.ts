import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArtifactHandle, LocalFile, WritableArtifact } from './artifacts';

/**
 * Raised when a step touches a slot its accessor does not declare, or writes to an input
 */
export class SlotAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlotAccessError';
    Object.setPrototypeOf(this, SlotAccessError.prototype);
  }
}

export type ParameterValue = string | number | boolean;

export interface StepInputInit {
  parameters?: Record<string, ParameterValue>;
  artifacts?: Record<string, ArtifactHandle>;
}

export interface StepOutputInit {
  parameters?: Record<string, null>;
  artifacts?: Record<string, WritableArtifact | null>;
}

/**
 * Values handed to a step. Parameters read back as strings, the way a container sees them.
 */
export class StepInput {
  readonly parameters: Readonly<Record<string, string>>;
  readonly artifacts: Readonly<Record<string, ArtifactHandle>>;

  constructor(init: StepInputInit = {}) {
    const parameters: Record<string, string> = {};
    for (const [key, value] of Object.entries(init.parameters ?? {})) {
      parameters[key] = String(value);
    }
    this.parameters = readOnlySlots('input parameter', parameters);
    this.artifacts = readOnlySlots('input artifact', { ...init.artifacts });
  }
}

/**
 * Slots a step fills in. Parameters are stored as strings; `null` artifacts get a file in a
 * temporary directory.
 */
export class StepOutput {
  readonly parameters: Record<string, ParameterValue>;
  readonly artifacts: Readonly<Record<string, WritableArtifact>>;

  constructor(init: StepOutputInit = {}) {
    this.parameters = writableParameters(Object.keys(init.parameters ?? {}));

    const artifacts: Record<string, WritableArtifact> = {};
    let tempDir: string | undefined;
    for (const [key, value] of Object.entries(init.artifacts ?? {})) {
      if (value) {
        artifacts[key] = value;
        continue;
      }
      tempDir ??= fs.mkdtempSync(path.join(os.tmpdir(), 'stagecraft-'));
      artifacts[key] = new LocalFile(path.join(tempDir, key));
    }
    this.artifacts = readOnlySlots('output artifact', artifacts);
  }
}

/**
 * Text stored for an output parameter
 */
export function stringifyParameter(value: unknown): string {
  if (typeof value === 'string') return value;
  const json = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

function readOnlySlots<T>(what: string, slots: Record<string, T>): Readonly<Record<string, T>> {
  return new Proxy(slots, {
    get(target, key, receiver) {
      if (typeof key !== 'string' || !Object.prototype.hasOwnProperty.call(target, key)) {
        if (typeof key === 'symbol' || key === 'then' || key === 'toJSON') {
          return Reflect.get(target, key, receiver);
        }
        throw new SlotAccessError(`Unknown ${what} '${key}'`);
      }
      return Reflect.get(target, key, receiver);
    },
    set(_target, key) {
      throw new SlotAccessError(`Cannot assign ${what} '${String(key)}'`);
    },
    deleteProperty(_target, key) {
      throw new SlotAccessError(`Cannot delete ${what} '${String(key)}'`);
    },
  });
}

function writableParameters(names: string[]): Record<string, ParameterValue> {
  const declared = new Set(names);
  const values = new Map<string, string>();

  return new Proxy<Record<string, ParameterValue>>(
    {},
    {
      get(target, key, receiver) {
        if (typeof key !== 'string' || key === 'then' || key === 'toJSON') {
          return Reflect.get(target, key, receiver);
        }
        if (!declared.has(key)) {
          throw new SlotAccessError(`Unknown output parameter '${key}'`);
        }
        const value = values.get(key);
        if (value === undefined) {
          throw new SlotAccessError(`Output parameter '${key}' has not been written`);
        }
        return value;
      },
      set(_target, key, value: unknown) {
        if (typeof key !== 'string' || !declared.has(key)) {
          throw new SlotAccessError(`Unknown output parameter '${String(key)}'`);
        }
        values.set(key, stringifyParameter(value));
        return true;
      },
      has(_target, key) {
        return typeof key === 'string' && values.has(key);
      },
      ownKeys() {
        return [...values.keys()];
      },
      getOwnPropertyDescriptor(_target, key) {
        if (typeof key !== 'string') return undefined;
        const value = values.get(key);
        return value === undefined
          ? undefined
          : { value, enumerable: true, configurable: true, writable: true };
      },
      deleteProperty(_target, key) {
        throw new SlotAccessError(`Cannot delete output parameter '${String(key)}'`);
      },
    }
  );
}
