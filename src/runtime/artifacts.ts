import * as fs from 'fs';
import * as path from 'path';
import type { MountPoint } from './declarations';

/** A single file passed between steps */
export interface ArtifactHandle {
  readonly path: string;
  read(): string;
}

export interface WritableArtifact extends ArtifactHandle {
  write(content: string | Buffer): void;
}

/**
 * Existing file below a mount point, read by a step
 */
export class FileInput implements ArtifactHandle {
  readonly path: string;

  constructor(mount: MountPoint, relativePath: string) {
    this.path = mount.resolve(relativePath);
  }

  read(): string {
    return fs.readFileSync(this.path, 'utf8');
  }
}

/**
 * Local file a step writes; written to `path` below the mount point
 */
export class LocalFile implements WritableArtifact {
  constructor(readonly path: string) {}

  read(): string {
    return fs.readFileSync(this.path, 'utf8');
  }

  write(content: string | Buffer): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    fs.writeFileSync(this.path, content);
  }
}

/**
 * Destination below a mount point for an output artifact
 */
export class FileOutput extends LocalFile {
  constructor(mount: MountPoint, relativePath: string) {
    super(mount.resolve(relativePath));
  }
}
