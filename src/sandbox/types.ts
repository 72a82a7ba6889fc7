import type { ExecutionResult } from '../types.js';

/**
 * Lifecycle and exec surface of a container runtime. Every method addresses
 * the container owned by one sandbox session.
 */
export interface ContainerRuntime {
  /** No-op when the session's container is already running. */
  ensureRunning(sessionId: string): Promise<void>;
  /** Overlays the contents of `localDir` onto the container workspace. */
  copyTree(sessionId: string, localDir: string): Promise<void>;
  /** Resolves with the timeout sentinel instead of rejecting when `timeoutMs` elapses. */
  exec(sessionId: string, command: string[], timeoutMs: number): Promise<ExecutionResult>;
  /** Safe to call on a container that is already gone. */
  destroy(sessionId: string): Promise<void>;
  /** Session ids of every container this runtime created and has not removed. */
  list(): Promise<string[]>;
}

export interface ContainerSettings {
  image: string;
  workspace: string;
  containerPrefix: string;
  memory: string;
  cpus: number;
  network: string;
}
