import { randomBytes } from 'crypto';
import { isAbsolute, posix } from 'path';
import { PreconditionError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { FileSet, SandboxRunResult } from '../types.js';
import { ContainerMarkerCache, type DependencyCache } from './cache.js';
import { DependencyResolver } from './deps.js';
import { CommandExecutor } from './executor.js';
import type { InferenceStrategy } from './infer.js';
import { FileSynchronizer } from './sync.js';
import type { ContainerRuntime } from './types.js';

export const DEPS_MARKER = '.healbox-deps.sha256';

export interface SandboxRunner {
  run(files: FileSet, entryPoint: string): Promise<SandboxRunResult>;
}

export interface SandboxSessionOptions {
  runtime: ContainerRuntime;
  workspace: string;
  timeoutSec: number;
  serverTimeoutSec: number;
  installGuiPackages: boolean;
  id?: string;
  cache?: DependencyCache;
  inference?: InferenceStrategy;
}

export function newSessionId(): string {
  return randomBytes(6).toString('hex');
}

export function validateFileSet(files: FileSet, entryPoint: string): void {
  if (!Object.prototype.hasOwnProperty.call(files, entryPoint)) {
    throw new PreconditionError(`Entry point "${entryPoint}" is not in the file set`);
  }
  for (const path of Object.keys(files)) {
    if (path === '' || isAbsolute(path) || path.split(/[\\/]/).includes('..')) {
      throw new PreconditionError(`File path "${path}" must be relative to the project root`);
    }
  }
}

/**
 * Owns one named container for its lifetime. Nothing touches the runtime until
 * the first `run`; the owner must call `destroy` when done.
 */
export class SandboxSession implements SandboxRunner {
  readonly id: string;
  dependencyHashSeen?: string;

  private runtime: ContainerRuntime;
  private timeoutSec: number;
  private synchronizer: FileSynchronizer;
  private resolver: DependencyResolver;
  private executor: CommandExecutor;
  private log: Logger;

  constructor(opts: SandboxSessionOptions) {
    this.id = opts.id ?? newSessionId();
    this.runtime = opts.runtime;
    this.timeoutSec = opts.timeoutSec;
    this.synchronizer = new FileSynchronizer(opts.runtime);
    this.resolver = new DependencyResolver(opts.runtime, {
      cache: opts.cache ?? new ContainerMarkerCache(opts.runtime, posix.join(opts.workspace, DEPS_MARKER)),
      installTimeoutMs: opts.timeoutSec * 1000,
      installGuiPackages: opts.installGuiPackages,
      inference: opts.inference,
    });
    this.executor = new CommandExecutor(opts.runtime, opts.serverTimeoutSec);
    this.log = createLogger('sandbox').child({ sessionId: this.id });
  }

  async run(files: FileSet, entryPoint: string): Promise<SandboxRunResult> {
    validateFileSet(files, entryPoint);
    await this.runtime.ensureRunning(this.id);

    const decision = this.resolver.resolve(files);
    const pushed = decision.kind === 'manifest' && decision.manifest.synthesized
      ? { ...files, [decision.manifest.path]: decision.manifest.content }
      : files;
    await this.synchronizer.sync(this.id, pushed);

    const install = await this.resolver.install(this.id, decision);
    if (install.kind === 'ran' && install.result.exitCode !== 0) {
      return { ...install.result, phase: 'install' };
    }
    if (decision.kind === 'manifest') this.dependencyHashSeen = decision.manifest.hash;

    const result = await this.executor.execute(this.id, files, entryPoint, this.timeoutSec);
    this.log.info({ entryPoint, exitCode: result.exitCode }, 'run finished');
    return { ...result, phase: 'execute' };
  }

  async destroy(): Promise<void> {
    await this.runtime.destroy(this.id);
  }
}
