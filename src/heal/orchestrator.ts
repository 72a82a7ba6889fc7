import { PreconditionError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { validateFileSet, newSessionId, type SandboxRunner } from '../sandbox/session.js';
import {
  isSuccess, isTimeout,
  type FileSet, type HealingAttempt, type HealingResult, type HealingSession,
} from '../types.js';
import type { PatchGenerator } from './patch-generator.js';

export interface HealRequest {
  files: FileSet;
  entryPoint: string;
  maxAttempts: number;
  id?: string;
}

export type AttemptListener = (attempt: HealingAttempt, session: HealingSession) => void | Promise<void>;

export interface OrchestratorOptions {
  sandbox: SandboxRunner;
  patches: PatchGenerator;
  onAttempt?: AttemptListener;
}

const log = createLogger('heal');

export function toHealingResult(session: HealingSession): HealingResult {
  const last = session.history.at(-1);
  return {
    finalFiles: session.currentFiles,
    history: session.history,
    success: session.success,
    lastStdout: last?.result.stdout ?? '',
    lastStderr: last?.result.stderr ?? '',
  };
}

export function createHealingSession(req: HealRequest): HealingSession {
  if (!Number.isInteger(req.maxAttempts) || req.maxAttempts < 1) {
    throw new PreconditionError(`maxAttempts must be a positive integer, got ${req.maxAttempts}`);
  }
  validateFileSet(req.files, req.entryPoint);
  return {
    id: req.id ?? newSessionId(),
    entryPoint: req.entryPoint,
    currentFiles: { ...req.files },
    history: [],
    maxAttempts: req.maxAttempts,
    success: false,
    status: 'running',
  };
}

/**
 * Run, inspect, patch, repeat. Only PreconditionError and InfrastructureError
 * escape; every other failure ends up in the attempt history.
 */
export class RepairOrchestrator {
  private sandbox: SandboxRunner;
  private patches: PatchGenerator;
  private onAttempt?: AttemptListener;

  constructor(opts: OrchestratorOptions) {
    this.sandbox = opts.sandbox;
    this.patches = opts.patches;
    this.onAttempt = opts.onAttempt;
  }

  async heal(req: HealRequest): Promise<HealingResult> {
    return this.continue(createHealingSession(req));
  }

  /** Grants an exhausted session more attempts, keeping its files and history. */
  async resume(session: HealingSession, extraAttempts: number): Promise<HealingResult> {
    if (session.success) return toHealingResult(session);
    if (!Number.isInteger(extraAttempts) || extraAttempts < 1) {
      throw new PreconditionError(`extraAttempts must be a positive integer, got ${extraAttempts}`);
    }
    session.maxAttempts = session.history.length + extraAttempts;
    session.status = 'running';
    return this.continue(session);
  }

  async continue(session: HealingSession): Promise<HealingResult> {
    validateFileSet(session.currentFiles, session.entryPoint);

    while (session.history.length < session.maxAttempts) {
      const index = session.history.length;
      const snapshot = { ...session.currentFiles };
      const result = await this.sandbox.run(snapshot, session.entryPoint);

      if (isSuccess(result)) {
        session.success = true;
        await this.record(session, { index, files: snapshot, result, patchedPaths: [] });
        break;
      }

      log.info({
        session: session.id, attempt: index + 1, of: session.maxAttempts,
        phase: result.phase, exitCode: result.exitCode, timedOut: isTimeout(result),
      }, 'attempt failed, requesting patch');

      let patchedPaths: string[] = [];
      let patchError: string | undefined;
      try {
        const patch = await this.patches.request({
          files: { ...snapshot },
          entryPoint: session.entryPoint,
          stderr: result.stderr,
          stdout: result.stdout,
          phase: result.phase,
        });
        if (patch.kind === 'ok') {
          Object.assign(session.currentFiles, patch.updates);
          patchedPaths = Object.keys(patch.updates);
        }
      } catch (err) {
        // Counts as an empty patch; the attempt is still consumed.
        patchError = errorMessage(err);
        log.warn({ session: session.id, attempt: index + 1, err: patchError }, 'patch generator failed');
      }

      await this.record(session, { index, files: snapshot, result, patchedPaths, patchError });
    }

    session.status = session.success ? 'succeeded' : 'exhausted';
    log.info({ session: session.id, status: session.status, attempts: session.history.length }, 'healing finished');
    return toHealingResult(session);
  }

  private async record(session: HealingSession, attempt: HealingAttempt): Promise<void> {
    session.history.push(Object.freeze(attempt));
    await this.onAttempt?.(attempt, session);
  }
}
