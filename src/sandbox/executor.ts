import { posix } from 'path';
import { createLogger } from '../logger.js';
import type { ExecutionResult, FileSet } from '../types.js';
import type { ContainerRuntime } from './types.js';

const TEST_FILE = /^(test_.*|.*_test)\.py$/;

const SERVER_SIGNATURES: RegExp[] = [
  /from\s+flask\s+import|\bFlask\(/,
  /from\s+fastapi\s+import|\bFastAPI\(/,
  /\bimport\s+uvicorn\b|\buvicorn\.run\(/,
  /execute_from_command_line\(/,
];

const GUI_ERROR = /tkinter|libtk/i;

export const GUI_NOTE =
  '\n\nNOTE: This application requires GUI support which is not available in this sandbox. '
  + 'Generate a console-based version to run it here.';

export interface CommandPlan {
  command: string[];
  timeoutSec: number;
  kind: 'tests' | 'entry';
  clamped: boolean;       // a server framework was detected
}

export function findTestFiles(files: FileSet): string[] {
  return Object.keys(files)
    .filter(p => TEST_FILE.test(posix.basename(p)))
    .sort();
}

export function looksLikeServer(files: FileSet): boolean {
  return Object.entries(files).some(([path, content]) =>
    path.endsWith('.py') && SERVER_SIGNATURES.some(sig => sig.test(content)));
}

export function planCommand(
  files: FileSet,
  entryPoint: string,
  timeoutSec: number,
  serverTimeoutSec: number,
): CommandPlan {
  const tests = findTestFiles(files);
  const clamped = looksLikeServer(files) && serverTimeoutSec < timeoutSec;
  const effective = clamped ? serverTimeoutSec : timeoutSec;

  if (tests.length > 0) {
    return {
      command: ['python', '-m', 'pytest', ...tests, '--tb=short'],
      timeoutSec: effective,
      kind: 'tests',
      clamped,
    };
  }
  return { command: ['python', entryPoint], timeoutSec: effective, kind: 'entry', clamped };
}

/** Appends an explanation to GUI toolkit failures; the original stderr is kept verbatim. */
export function annotateStderr(result: ExecutionResult): ExecutionResult {
  if (result.exitCode === 0 || !GUI_ERROR.test(result.stderr)) return result;
  return { ...result, stderr: result.stderr + GUI_NOTE };
}

export class CommandExecutor {
  private runtime: ContainerRuntime;
  private serverTimeoutSec: number;
  private log = createLogger('executor');

  constructor(runtime: ContainerRuntime, serverTimeoutSec: number) {
    this.runtime = runtime;
    this.serverTimeoutSec = serverTimeoutSec;
  }

  async execute(
    sessionId: string,
    files: FileSet,
    entryPoint: string,
    timeoutSec: number,
  ): Promise<ExecutionResult> {
    const plan = planCommand(files, entryPoint, timeoutSec, this.serverTimeoutSec);
    if (plan.clamped) {
      this.log.info({ sessionId, timeoutSec: plan.timeoutSec }, 'server framework detected, clamping timeout');
    }

    if (plan.kind === 'tests') {
      const runner = await this.ensurePytest(sessionId);
      if (runner.exitCode !== 0) return runner;
    }

    this.log.info({ sessionId, command: plan.command.join(' ') }, 'running');
    const result = await this.runtime.exec(sessionId, plan.command, plan.timeoutSec * 1000);
    return annotateStderr(result);
  }

  private async ensurePytest(sessionId: string): Promise<ExecutionResult> {
    const probe = await this.runtime.exec(sessionId, ['python', '-c', 'import pytest'], 60_000);
    if (probe.exitCode === 0) return probe;
    this.log.info({ sessionId }, 'installing pytest');
    return this.runtime.exec(sessionId, ['pip', 'install', '-q', 'pytest'], 300_000);
  }
}
