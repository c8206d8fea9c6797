import * as os from 'os';
import * as path from 'path';

/**
 * A local directory standing in for an S3 root while a workflow runs on this machine
 */
export class MountPoint {
  readonly localRoot: string;

  constructor(
    localRoot: string,
    readonly remoteRoot: string
  ) {
    this.localRoot = expandHome(localRoot);
  }

  /** Local path of a file below this mount point */
  resolve(relativePath: string): string {
    return path.join(this.localRoot, relativePath.replace(/^\/+/, ''));
  }
}

export function mountPoint(localRoot: string, remoteRoot: string): MountPoint {
  return new MountPoint(localRoot, remoteRoot);
}

/**
 * Declare a workflow parameter. Locally the default is the value; in the emitted workflow it
 * can be overridden at submission.
 */
export function param<T extends string | number | boolean>(defaultValue: T): T {
  return defaultValue;
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
