import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { FileSet } from '../types.js';
import type { ContainerRuntime } from './types.js';

export class FileSynchronizer {
  private runtime: ContainerRuntime;

  constructor(runtime: ContainerRuntime) {
    this.runtime = runtime;
  }

  /** Writes the FileSet into a fresh directory nobody else uses. */
  stage(files: FileSet): string {
    const dir = mkdtempSync(join(tmpdir(), 'healbox-sync-'));
    for (const [path, content] of Object.entries(files)) {
      const abs = join(dir, path);
      mkdirSync(dirname(abs), { recursive: true });
      writeFileSync(abs, content, 'utf-8');
    }
    return dir;
  }

  async push(sessionId: string, localDir: string): Promise<void> {
    await this.runtime.copyTree(sessionId, localDir);
  }

  /** Overlay: files already in the workspace but absent from `files` stay put. */
  async sync(sessionId: string, files: FileSet): Promise<void> {
    const dir = this.stage(files);
    try {
      await this.push(sessionId, dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
