#!/usr/bin/env node
import './env.js';
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, realpathSync } from 'fs';
import { join, resolve } from 'path';
import { loadConfig, type Config } from '../config/index.js';
import { PreconditionError, errorMessage } from '../errors.js';
import { LlmPatchGenerator } from '../heal/patch-generator.js';
import { HealingService } from '../heal/service.js';
import { createLLMAdapter } from '../llm/factory.js';
import { loadProjectConfig, readFileSet, writeFileSet } from '../project/loader.js';
import { DockerRuntime } from '../sandbox/docker.js';
import { buildServer } from '../server/index.js';
import { SessionStore, type HealingRecord } from '../store/session-store.js';
import { isSuccess, isTimeout, type HealingAttempt } from '../types.js';
import { VERSION } from '../version.js';

interface RunOptions {
  entry?: string;
  maxAttempts?: number;
  timeout?: number;
  image?: string;
  write?: boolean;
}

interface ResumeOptions {
  attempts?: number;
  write?: boolean;
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** One line per attempt, e.g. `attempt 2: execute exit 1, patched main.py`. */
export function formatAttempt(attempt: HealingAttempt): string {
  const { result } = attempt;
  const outcome = isTimeout(result) ? 'timed out' : `exit ${result.exitCode}`;
  let line = `attempt ${attempt.index + 1}: ${result.phase} ${outcome}`;
  if (isSuccess(result)) return `${line}, ok`;
  if (attempt.patchError) return `${line}, patch failed (${attempt.patchError})`;
  line += attempt.patchedPaths.length > 0
    ? `, patched ${attempt.patchedPaths.join(', ')}`
    : ', no patch';
  return line;
}

interface ServiceOverrides {
  image?: string;
  timeoutSec?: number;
  quiet?: boolean;
}

function createService(config: Config, overrides: ServiceOverrides = {}) {
  const sandbox = { ...config.sandbox };
  if (overrides.image) sandbox.image = overrides.image;
  if (overrides.timeoutSec) sandbox.timeoutSec = overrides.timeoutSec;

  const store = new SessionStore(join(config.home, 'sessions.json'));
  const service = new HealingService({
    store,
    runtime: new DockerRuntime(sandbox),
    patches: new LlmPatchGenerator(createLLMAdapter(config.llm)),
    sandbox,
    onAttempt: overrides.quiet ? undefined : (_id, attempt) => console.log(formatAttempt(attempt)),
  });
  return { service, store };
}

function report(record: HealingRecord, write: boolean | undefined): void {
  if (write && record.projectDir) {
    const written = writeFileSet(record.projectDir, record.currentFiles);
    console.log(written.length > 0 ? `Wrote ${written.join(', ')}` : 'No files changed.');
  }
  if (record.status === 'succeeded') {
    console.log(`\nSession ${record.id} succeeded after ${record.history.length} attempt(s).`);
    return;
  }
  const last = record.history.at(-1);
  console.error(`\nSession ${record.id} ${record.status} after ${record.history.length} attempt(s).`);
  if (record.error) console.error(record.error);
  else if (last?.result.stderr) console.error(last.result.stderr.trimEnd());
  process.exitCode = 1;
}

function guard<A extends unknown[]>(action: (...args: A) => Promise<void> | void) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(err instanceof PreconditionError ? err.message : `Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
}

const program = new Command();

program
  .name('healbox')
  .description('Run Python projects in a Docker sandbox and repair them until they pass')
  .version(VERSION);

program
  .command('run')
  .description('Run a project and repair it until it succeeds')
  .argument('[dir]', 'Project directory', '.')
  .option('--entry <path>', 'Entry point, relative to the project root')
  .option('--max-attempts <n>', 'Maximum sandbox runs', parseCount)
  .option('--timeout <seconds>', 'Per-command timeout in seconds', parseCount)
  .option('--image <name>', 'Override Docker image')
  .option('--write', 'Write the final files back into the project')
  .action(guard(async (dir: string, opts: RunOptions) => {
    const config = loadConfig();
    const projectDir = resolve(dir);
    const project = loadProjectConfig(projectDir);
    const { service } = createService(config, {
      image: opts.image ?? project.image,
      timeoutSec: opts.timeout ?? project.timeout,
    });

    const record = service.submit({
      files: readFileSet(projectDir),
      entryPoint: opts.entry ?? project.entry,
      maxAttempts: opts.maxAttempts ?? project.maxAttempts ?? config.heal.maxAttempts,
      projectDir,
    });
    console.log(`Session ${record.id}: ${record.entryPoint}, up to ${record.maxAttempts} attempt(s)`);

    report(await service.run(record.id), opts.write);
  }));

program
  .command('resume')
  .description('Give an exhausted session more attempts')
  .argument('<id>', 'Session ID')
  .option('--attempts <n>', 'Additional attempts', parseCount)
  .option('--write', 'Write the final files back into the project')
  .action(guard(async (id: string, opts: ResumeOptions) => {
    const config = loadConfig();
    const { service } = createService(config);
    report(await service.resume(id, opts.attempts ?? config.heal.maxAttempts), opts.write);
  }));

program
  .command('status')
  .description('Show a session')
  .argument('<id>', 'Session ID')
  .action((id: string) => {
    const store = new SessionStore(join(loadConfig().home, 'sessions.json'));
    const record = store.get(id);
    if (!record) { console.error(`Session ${id} not found`); process.exit(1); }
    console.log(JSON.stringify(record, null, 2));
  });

program
  .command('list')
  .description('List all sessions')
  .action(() => {
    const store = new SessionStore(join(loadConfig().home, 'sessions.json'));
    for (const record of store.list()) {
      const attempts = `${record.history.length}/${record.maxAttempts}`;
      console.log(`${record.id}  ${record.status.padEnd(10)}  ${attempts.padEnd(6)}  ${record.entryPoint}`);
    }
  });

program
  .command('clean')
  .description('Remove sandbox containers left behind by crashed runs; containers of running sessions are kept')
  .argument('[id]', 'Session ID (omit to remove all but running sessions)')
  .option('--force', 'Also remove containers of sessions still marked running')
  .action(guard(async (id: string | undefined, opts: { force?: boolean }) => {
    const { service } = createService(loadConfig(), { quiet: true });
    const removed = await service.clean(id, { force: opts.force });
    console.log(removed.length > 0 ? `Removed ${removed.length} container(s).` : 'Nothing to clean.');
  }));

program
  .command('serve')
  .description('Start the HTTP API')
  .action(guard(async () => {
    const config = loadConfig();
    const { service, store } = createService(config, { quiet: true });
    const app = await buildServer({
      service,
      store,
      defaultMaxAttempts: config.heal.maxAttempts,
      logLevel: config.logLevel,
    });
    await app.listen({ port: config.server.port, host: config.server.host });
  }));

// Run CLI when executed directly
const script = process.argv[1];
const invoked = script && existsSync(script) ? realpathSync(script) : '';
const isMain = invoked.endsWith('cli/index.ts') || invoked.endsWith('cli/index.js');

if (isMain) {
  program.parseAsync().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
}
