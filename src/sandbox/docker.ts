import Dockerode from 'dockerode';
import tar from 'tar-fs';
import { PassThrough, type Duplex } from 'stream';
import { InfrastructureError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { TIMEOUT_EXIT_CODE, type ExecutionResult } from '../types.js';
import type { ContainerRuntime, ContainerSettings } from './types.js';

export const SESSION_LABEL = 'healbox.session';

// Extra time the host waits past the in-container `timeout` before giving up on the stream.
const EXEC_GRACE_MS = 5_000;

const log = createLogger('docker');

export interface DockerExec {
  start(opts: { hijack: boolean; stdin: boolean }): Promise<Duplex>;
  inspect(): Promise<{ ExitCode?: number | null }>;
}

export interface DockerContainer {
  inspect(): Promise<{ State: { Running: boolean } }>;
  start(): Promise<unknown>;
  exec(opts: { Cmd: string[]; AttachStdout: boolean; AttachStderr: boolean; WorkingDir: string }): Promise<DockerExec>;
  putArchive(file: NodeJS.ReadableStream, opts: { path: string }): Promise<unknown>;
  remove(opts: { force: boolean }): Promise<unknown>;
}

/** The slice of the Docker API the runtime uses; a `Dockerode` instance satisfies it. */
export interface DockerClient {
  getContainer(name: string): DockerContainer;
  createContainer(opts: Dockerode.ContainerCreateOptions): Promise<DockerContainer>;
  getImage(name: string): { inspect(): Promise<unknown> };
  pull(image: string): Promise<NodeJS.ReadableStream>;
  listContainers(opts: { all: boolean; filters: { label: string[] } }): Promise<Array<{ Labels: Record<string, string> }>>;
  modem: {
    demuxStream(stream: NodeJS.ReadableStream, stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream): void;
    followProgress(stream: NodeJS.ReadableStream, onFinished: (err: Error | null) => void): void;
  };
}

export function parseMemory(mem: string): number {
  const match = mem.match(/^(\d+)([gmk]?)$/i);
  if (!match) return 2 * 1024 * 1024 * 1024;
  const num = parseInt(match[1], 10);
  switch (match[2]?.toLowerCase()) {
    case 'g': return num * 1024 * 1024 * 1024;
    case 'm': return num * 1024 * 1024;
    case 'k': return num * 1024;
    default: return num;
  }
}

function statusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function collector() {
  const chunks: Buffer[] = [];
  const sink = new PassThrough();
  sink.on('data', (chunk: Buffer) => chunks.push(chunk));
  return { sink, text: () => Buffer.concat(chunks).toString('utf-8') };
}

function waitForEnd(stream: NodeJS.ReadableStream, ms: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => { clearTimeout(timer); resolve(true); };
    stream.once('end', done);
    stream.once('close', done);
    stream.once('error', (err: Error) => {
      clearTimeout(timer);
      reject(new InfrastructureError(`Docker exec stream failed: ${err.message}`, err));
    });
  });
}

function timedOut(stdout: string, stderr: string, seconds: number): ExecutionResult {
  const note = `Execution timed out after ${seconds}s`;
  return {
    stdout,
    stderr: stderr ? `${stderr}\n${note}` : note,
    exitCode: TIMEOUT_EXIT_CODE,
  };
}

/**
 * One long-lived container per sandbox session, named `<prefix>-<sessionId>`.
 * Commands run through `docker exec`; files arrive as tar archives.
 */
export class DockerRuntime implements ContainerRuntime {
  private docker: DockerClient;
  private settings: ContainerSettings;

  constructor(settings: ContainerSettings, docker: DockerClient = new Dockerode()) {
    this.settings = settings;
    this.docker = docker;
  }

  containerName(sessionId: string): string {
    return `${this.settings.containerPrefix}-${sessionId}`;
  }

  buildContainerOptions(sessionId: string): Dockerode.ContainerCreateOptions {
    const env: string[] = ['PYTHONUNBUFFERED=1', 'PIP_DISABLE_PIP_VERSION_CHECK=1'];
    if (process.env.HTTP_PROXY) env.push(`HTTP_PROXY=${process.env.HTTP_PROXY}`);
    if (process.env.HTTPS_PROXY) env.push(`HTTPS_PROXY=${process.env.HTTPS_PROXY}`);
    if (process.env.NO_PROXY) env.push(`NO_PROXY=${process.env.NO_PROXY}`);

    return {
      name: this.containerName(sessionId),
      Image: this.settings.image,
      Cmd: ['sleep', 'infinity'],
      WorkingDir: this.settings.workspace,
      Env: env,
      Tty: false,
      Labels: { [SESSION_LABEL]: sessionId },
      HostConfig: {
        Memory: parseMemory(this.settings.memory),
        NanoCpus: this.settings.cpus * 1e9,
        NetworkMode: this.settings.network,
      },
    };
  }

  async ensureRunning(sessionId: string): Promise<void> {
    const state = await this.containerState(sessionId);
    if (state === 'running') return;
    if (state === 'stopped') {
      // A stopped container may hold another project's workspace; start clean.
      log.warn({ sessionId }, 'removing stopped container before recreating it');
      await this.destroy(sessionId);
    }

    await this.pull(this.settings.image);
    const container = await this.call('create container', () =>
      this.docker.createContainer(this.buildContainerOptions(sessionId)));
    await this.call('start container', () => container.start());
    log.info({ sessionId, container: this.containerName(sessionId), image: this.settings.image }, 'container started');

    const mkdir = await this.exec(sessionId, ['mkdir', '-p', this.settings.workspace], 30_000);
    if (mkdir.exitCode !== 0) {
      throw new InfrastructureError(`Failed to provision ${this.settings.workspace}: ${mkdir.stderr.trim()}`);
    }
  }

  async copyTree(sessionId: string, localDir: string): Promise<void> {
    const container = this.docker.getContainer(this.containerName(sessionId));
    await this.call('copy files', () =>
      container.putArchive(tar.pack(localDir), { path: this.settings.workspace }));
  }

  async exec(sessionId: string, command: string[], timeoutMs: number): Promise<ExecutionResult> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const container = this.docker.getContainer(this.containerName(sessionId));
    const exec = await this.call('exec', () => container.exec({
      Cmd: ['timeout', String(seconds), ...command],
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: this.settings.workspace,
    }));
    const stream = await this.call('exec start', () => exec.start({ hijack: true, stdin: false }));

    const stdout = collector();
    const stderr = collector();
    this.docker.modem.demuxStream(stream, stdout.sink, stderr.sink);

    const finished = await waitForEnd(stream, seconds * 1000 + EXEC_GRACE_MS);
    if (!finished) {
      stream.destroy();
      log.warn({ sessionId, command: command.join(' ') }, 'exec stream did not end in time');
      return timedOut(stdout.text(), stderr.text(), seconds);
    }

    const info = await this.call('exec inspect', () => exec.inspect());
    const exitCode = info.ExitCode ?? 1;
    if (exitCode === TIMEOUT_EXIT_CODE) {
      return timedOut(stdout.text(), stderr.text(), seconds);
    }
    return { stdout: stdout.text(), stderr: stderr.text(), exitCode };
  }

  async destroy(sessionId: string): Promise<void> {
    const container = this.docker.getContainer(this.containerName(sessionId));
    try {
      await container.remove({ force: true });
      log.info({ sessionId }, 'container removed');
    } catch (err) {
      if (statusCode(err) === 404) return;
      log.warn({ sessionId, err: errorMessage(err) }, 'failed to remove container');
    }
  }

  async list(): Promise<string[]> {
    const containers = await this.call('list containers', () =>
      this.docker.listContainers({ all: true, filters: { label: [SESSION_LABEL] } }));
    return containers
      .map(c => c.Labels[SESSION_LABEL])
      .filter((id): id is string => Boolean(id));
  }

  private async containerState(sessionId: string): Promise<'running' | 'stopped' | 'missing'> {
    const container = this.docker.getContainer(this.containerName(sessionId));
    try {
      const info = await container.inspect();
      return info.State.Running ? 'running' : 'stopped';
    } catch (err) {
      if (statusCode(err) === 404) return 'missing';
      throw new InfrastructureError(`Docker is unreachable: ${errorMessage(err)}`, err);
    }
  }

  private async pull(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (err) {
      if (statusCode(err) !== 404) {
        throw new InfrastructureError(`Docker is unreachable: ${errorMessage(err)}`, err);
      }
    }

    log.info({ image }, 'pulling image');
    const stream = await this.call('pull', () => this.docker.pull(image));
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(new InfrastructureError(`Failed to pull ${image}: ${err.message}`, err));
        else resolve();
      });
    });
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof InfrastructureError) throw err;
      throw new InfrastructureError(`Docker ${what} failed: ${errorMessage(err)}`, err);
    }
  }
}
