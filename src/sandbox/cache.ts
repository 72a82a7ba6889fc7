import { createLogger } from '../logger.js';
import type { ContainerRuntime } from './types.js';

const log = createLogger('deps');

/** Last successfully installed manifest hash, keyed by sandbox session. */
export interface DependencyCache {
  get(sessionId: string): Promise<string | undefined>;
  set(sessionId: string, hash: string): Promise<void>;
}

const WRITE_SCRIPT = 'printf "%s" "$1" > "$2"';

/**
 * Keeps the hash in a marker file inside the session's container, so it lives
 * and dies with the container and its installed packages.
 */
export class ContainerMarkerCache implements DependencyCache {
  private runtime: ContainerRuntime;
  private markerPath: string;

  constructor(runtime: ContainerRuntime, markerPath: string) {
    this.runtime = runtime;
    this.markerPath = markerPath;
  }

  async get(sessionId: string): Promise<string | undefined> {
    const result = await this.runtime.exec(sessionId, ['cat', this.markerPath], 30_000);
    if (result.exitCode !== 0) return undefined;
    return result.stdout.trim() || undefined;
  }

  async set(sessionId: string, hash: string): Promise<void> {
    const result = await this.runtime.exec(
      sessionId, ['sh', '-c', WRITE_SCRIPT, 'sh', hash, this.markerPath], 30_000,
    );
    // A missing marker only costs a reinstall on the next run.
    if (result.exitCode !== 0) {
      log.warn({ sessionId, stderr: result.stderr.trim() }, 'failed to record dependency hash');
    }
  }
}
