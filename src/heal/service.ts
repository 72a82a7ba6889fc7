import { PreconditionError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { SandboxSession, newSessionId } from '../sandbox/session.js';
import type { ContainerRuntime } from '../sandbox/types.js';
import { toHealingSession, type HealingRecord, type SessionStore } from '../store/session-store.js';
import type { FileSet, HealingAttempt, HealingResult } from '../types.js';
import { detectEntryPoint } from './entry.js';
import { RepairOrchestrator, createHealingSession } from './orchestrator.js';
import type { PatchGenerator } from './patch-generator.js';

export interface SandboxRunSettings {
  workspace: string;
  timeoutSec: number;
  serverTimeoutSec: number;
  installGuiPackages: boolean;
}

export interface HealingServiceOptions {
  store: SessionStore;
  runtime: ContainerRuntime;
  patches: PatchGenerator;
  sandbox: SandboxRunSettings;
  onAttempt?: (id: string, attempt: HealingAttempt) => void;
}

export interface SubmitInput {
  files: FileSet;
  entryPoint?: string;
  maxAttempts: number;
  projectDir?: string;
}

const log = createLogger('service');

/**
 * Ties stored healing sessions to sandbox runs. Each run gets its own
 * container, removed once the loop ends however it ends.
 */
export class HealingService {
  private store: SessionStore;
  private runtime: ContainerRuntime;
  private patches: PatchGenerator;
  private settings: SandboxRunSettings;
  private onAttempt?: (id: string, attempt: HealingAttempt) => void;
  private inFlight = new Map<string, Promise<HealingRecord | undefined>>();

  constructor(opts: HealingServiceOptions) {
    this.store = opts.store;
    this.runtime = opts.runtime;
    this.patches = opts.patches;
    this.settings = opts.sandbox;
    this.onAttempt = opts.onAttempt;
  }

  /** Validates and stores a new session; nothing runs yet. */
  submit(input: SubmitInput): HealingRecord {
    const entryPoint = input.entryPoint ?? detectEntryPoint(input.files);
    if (!entryPoint) {
      throw new PreconditionError('No entry point given and none could be detected');
    }
    const session = createHealingSession({
      id: newSessionId(),
      files: input.files,
      entryPoint,
      maxAttempts: input.maxAttempts,
    });
    return this.store.create({
      id: session.id,
      entryPoint,
      maxAttempts: session.maxAttempts,
      files: input.files,
      projectDir: input.projectDir,
    });
  }

  async run(id: string): Promise<HealingRecord> {
    const record = this.require(id);
    const session = createHealingSession({
      id, files: record.currentFiles, entryPoint: record.entryPoint, maxAttempts: record.maxAttempts,
    });
    return this.track(id, orchestrator => orchestrator.continue(session));
  }

  async resume(id: string, extraAttempts: number): Promise<HealingRecord> {
    const record = this.require(id);
    if (record.status !== 'exhausted') {
      throw new PreconditionError(`Session ${id} is ${record.status}; only exhausted sessions can be resumed`);
    }
    const session = toHealingSession(record);
    return this.track(id, orchestrator => orchestrator.resume(session, extraAttempts));
  }

  /** Starts `run`/`resume` without waiting; failures are recorded on the session. */
  dispatch(id: string, work: (id: string) => Promise<HealingRecord>): void {
    const pending: Promise<HealingRecord | undefined> = work(id)
      .catch((err: unknown) => {
        log.error({ session: id, err: errorMessage(err) }, 'healing session failed');
        return this.store.get(id);
      })
      .finally(() => {
        if (this.inFlight.get(id) === pending) this.inFlight.delete(id);
      });
    this.inFlight.set(id, pending);
  }

  /** Session ids dispatched and not yet settled. */
  active(): string[] {
    return [...this.inFlight.keys()];
  }

  async waitFor(id: string): Promise<HealingRecord | undefined> {
    return this.inFlight.get(id) ?? this.store.get(id);
  }

  /**
   * Removes sandbox containers. With an id, only that session's container.
   * Without one, every labelled container except those of sessions still
   * marked running, unless `force` is set.
   */
  async clean(id?: string, opts: { force?: boolean } = {}): Promise<string[]> {
    const leaked = await this.runtime.list();
    let sandboxIds: string[];
    if (id) {
      sandboxIds = leaked.filter(s => s === this.store.get(id)?.sandboxId);
    } else if (opts.force) {
      sandboxIds = leaked;
    } else {
      const live = new Set(this.store.list()
        .filter(r => r.status === 'running')
        .map(r => r.sandboxId));
      sandboxIds = leaked.filter(s => !live.has(s));
    }
    for (const sandboxId of sandboxIds) {
      await this.runtime.destroy(sandboxId);
    }
    return sandboxIds;
  }

  private require(id: string): HealingRecord {
    const record = this.store.get(id);
    if (!record) throw new PreconditionError(`Session ${id} not found`);
    return record;
  }

  private async track(
    id: string,
    loop: (orchestrator: RepairOrchestrator) => Promise<HealingResult>,
  ): Promise<HealingRecord> {
    const sandbox = new SandboxSession({ runtime: this.runtime, ...this.settings });
    this.store.update(id, {
      status: 'running',
      sandboxId: sandbox.id,
      error: undefined,
      started_at: new Date().toISOString(),
      finished_at: undefined,
    });

    const orchestrator = new RepairOrchestrator({
      sandbox,
      patches: this.patches,
      onAttempt: (attempt, session) => {
        this.store.update(id, {
          currentFiles: { ...session.currentFiles },
          history: [...session.history],
          maxAttempts: session.maxAttempts,
        });
        this.onAttempt?.(id, attempt);
      },
    });

    try {
      const result = await loop(orchestrator);
      return this.finish(id, {
        status: result.success ? 'succeeded' : 'exhausted',
        currentFiles: result.finalFiles,
        history: result.history,
      });
    } catch (err) {
      this.finish(id, { status: 'failed', error: errorMessage(err) });
      throw err;
    } finally {
      await sandbox.destroy();
    }
  }

  private finish(id: string, patch: Partial<HealingRecord>): HealingRecord {
    const updated = this.store.update(id, { ...patch, finished_at: new Date().toISOString() });
    if (!updated) throw new PreconditionError(`Session ${id} not found`);
    return updated;
  }
}
