import { createHash } from 'crypto';
import { createLogger } from '../logger.js';
import type { ExecutionResult, FileSet } from '../types.js';
import type { DependencyCache } from './cache.js';
import { guiToolkitsIn, inferPythonRequirements, scanImports, type InferenceStrategy } from './infer.js';
import type { ContainerRuntime } from './types.js';

export type ManifestFormat = 'requirements' | 'pyproject' | 'setup' | 'pipfile' | 'poetry-lock';

export interface DependencyManifest {
  path: string;
  format: ManifestFormat;
  content: string;
  hash: string;
  synthesized: boolean;   // inferred from imports, not part of the FileSet
}

export type ManifestDecision =
  | { kind: 'none'; guiToolkits: string[] }
  | { kind: 'manifest'; manifest: DependencyManifest; guiToolkits: string[] };

export type InstallOutcome =
  | { kind: 'skip'; reason: 'no-manifest' | 'cache-hit' }
  | { kind: 'ran'; result: ExecutionResult };

export const MANIFEST_PRIORITY: ReadonlyArray<{ path: string; format: ManifestFormat }> = [
  { path: 'requirements.txt', format: 'requirements' },
  { path: 'pyproject.toml', format: 'pyproject' },
  { path: 'setup.py', format: 'setup' },
  { path: 'Pipfile', format: 'pipfile' },
  { path: 'poetry.lock', format: 'poetry-lock' },
];

// Toolkits whose system libraries come from the python3-tk package.
const TK_TOOLKITS = new Set(['tkinter', 'tk', 'matplotlib']);
const GUI_SYSTEM_PACKAGES = 'apt-get update && apt-get install -y python3-tk python3-dev';

const log = createLogger('deps');

export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

export function installCommand(manifest: DependencyManifest): string[] {
  switch (manifest.format) {
    case 'requirements':
      return ['pip', 'install', '-r', manifest.path];
    case 'pyproject':
    case 'setup':
      return ['pip', 'install', '-e', '.'];
    case 'pipfile':
      return ['sh', '-c', 'pip install -q pipenv && pipenv install --system --skip-lock'];
    case 'poetry-lock':
      return ['sh', '-c', 'pip install -q poetry && poetry config virtualenvs.create false && poetry install --no-root'];
  }
}

function requirementName(spec: string): string | undefined {
  return spec.trim().match(/^([A-Za-z0-9][A-Za-z0-9._-]*)/)?.[1];
}

// VCS, URL and `name @ url` lines install under a name pip show cannot predict.
function isDirectReference(line: string): boolean {
  return /^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(line) || line.includes('@');
}

function firstQuoted(list: string): string | undefined {
  const m = list.match(/["']([^"']+)["']/);
  return m ? requirementName(m[1]) : undefined;
}

/** Distribution name of the first dependency the manifest declares, used for the sentinel probe. */
export function firstDeclaredPackage(manifest: DependencyManifest): string | undefined {
  const { content } = manifest;
  switch (manifest.format) {
    case 'requirements': {
      const line = content.split('\n')
        .map(l => l.trim())
        .find(l => l !== '' && !l.startsWith('#') && !l.startsWith('-') && !isDirectReference(l));
      return line ? requirementName(line) : undefined;
    }
    case 'pyproject': {
      const m = content.match(/^\s*dependencies\s*=\s*\[([\s\S]*?)\]/m);
      return m ? firstQuoted(m[1]) : undefined;
    }
    case 'setup': {
      const m = content.match(/install_requires\s*=\s*\[([\s\S]*?)\]/);
      return m ? firstQuoted(m[1]) : undefined;
    }
    case 'pipfile': {
      const section = content.split(/^\[packages\]\s*$/m)[1];
      if (section === undefined) return undefined;
      const m = section.match(/^\s*([A-Za-z0-9][A-Za-z0-9._-]*)\s*=/m);
      return m?.[1];
    }
    case 'poetry-lock': {
      const m = content.match(/\[\[package\]\]\s*\n\s*name\s*=\s*"([^"]+)"/);
      return m?.[1];
    }
  }
}

export interface ResolverOptions {
  cache: DependencyCache;
  installTimeoutMs: number;
  installGuiPackages: boolean;
  inference?: InferenceStrategy;
}

export class DependencyResolver {
  private runtime: ContainerRuntime;
  private cache: DependencyCache;
  private installTimeoutMs: number;
  private installGuiPackages: boolean;
  private inference: InferenceStrategy;
  private guiPrepared = new Set<string>();

  constructor(runtime: ContainerRuntime, options: ResolverOptions) {
    this.runtime = runtime;
    this.cache = options.cache;
    this.installTimeoutMs = options.installTimeoutMs;
    this.installGuiPackages = options.installGuiPackages;
    this.inference = options.inference ?? inferPythonRequirements;
  }

  resolve(files: FileSet): ManifestDecision {
    const guiToolkits = guiToolkitsIn(scanImports(files));

    for (const candidate of MANIFEST_PRIORITY) {
      const content = files[candidate.path];
      if (content === undefined) continue;
      return {
        kind: 'manifest',
        guiToolkits,
        manifest: { ...candidate, content, hash: hashContent(content), synthesized: false },
      };
    }

    const inferred = this.inference(files);
    if (!inferred) return { kind: 'none', guiToolkits };
    log.info({ packages: inferred.packages }, 'no manifest found, inferred dependencies from imports');
    return {
      kind: 'manifest',
      guiToolkits,
      manifest: {
        path: inferred.path,
        format: 'requirements',
        content: inferred.content,
        hash: hashContent(inferred.content),
        synthesized: true,
      },
    };
  }

  async install(sessionId: string, decision: ManifestDecision): Promise<InstallOutcome> {
    await this.prepareGuiPackages(sessionId, decision.guiToolkits);
    if (decision.kind === 'none') return { kind: 'skip', reason: 'no-manifest' };

    const { manifest } = decision;
    const previous = await this.cache.get(sessionId);
    if (previous === manifest.hash) {
      if (await this.sentinelPasses(sessionId, manifest)) {
        log.debug({ sessionId, manifest: manifest.path }, 'manifest unchanged, skipping install');
        return { kind: 'skip', reason: 'cache-hit' };
      }
      log.info({ sessionId, manifest: manifest.path }, 'hash matched but sentinel probe failed, reinstalling');
    }

    const command = installCommand(manifest);
    log.info({ sessionId, command: command.join(' ') }, 'installing dependencies');
    const result = await this.runtime.exec(sessionId, command, this.installTimeoutMs);
    if (result.exitCode !== 0) {
      log.warn({ sessionId, exitCode: result.exitCode }, 'dependency install failed');
      return { kind: 'ran', result };
    }
    await this.cache.set(sessionId, manifest.hash);
    return { kind: 'ran', result };
  }

  private async sentinelPasses(sessionId: string, manifest: DependencyManifest): Promise<boolean> {
    const pkg = firstDeclaredPackage(manifest);
    if (!pkg) return true;
    const probe = await this.runtime.exec(sessionId, ['pip', 'show', '-q', pkg], 60_000);
    return probe.exitCode === 0;
  }

  private async prepareGuiPackages(sessionId: string, toolkits: string[]): Promise<void> {
    if (!this.installGuiPackages || this.guiPrepared.has(sessionId)) return;
    if (!toolkits.some(t => TK_TOOLKITS.has(t))) return;
    this.guiPrepared.add(sessionId);

    const result = await this.runtime.exec(sessionId, ['sh', '-c', GUI_SYSTEM_PACKAGES], this.installTimeoutMs);
    if (result.exitCode !== 0) {
      log.warn({ sessionId, stderr: result.stderr.slice(-500) }, 'GUI system packages failed to install');
    }
  }
}
