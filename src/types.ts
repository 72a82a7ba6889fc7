export const EXIT_SUCCESS = 0;
export const TIMEOUT_EXIT_CODE = 124;

/** Relative path → text content for one execution/repair cycle. */
export type FileSet = Record<string, string>;

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type RunPhase = 'install' | 'execute';

export interface SandboxRunResult extends ExecutionResult {
  phase: RunPhase;
}

export interface HealingAttempt {
  readonly index: number;
  readonly files: Readonly<FileSet>;       // snapshot taken before the run
  readonly result: SandboxRunResult;
  readonly patchedPaths: readonly string[];
  readonly patchError?: string;
}

export type HealingStatus = 'running' | 'succeeded' | 'exhausted';

export interface HealingSession {
  id: string;
  entryPoint: string;
  currentFiles: FileSet;
  history: HealingAttempt[];
  maxAttempts: number;
  success: boolean;
  status: HealingStatus;
}

export interface HealingResult {
  finalFiles: FileSet;
  history: HealingAttempt[];
  success: boolean;
  lastStdout: string;
  lastStderr: string;
}

export function isSuccess(result: ExecutionResult): boolean {
  return result.exitCode === EXIT_SUCCESS;
}

export function isTimeout(result: ExecutionResult): boolean {
  return result.exitCode === TIMEOUT_EXIT_CODE;
}
