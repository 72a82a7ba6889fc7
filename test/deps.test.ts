import { describe, it, expect, beforeEach } from 'vitest';
import { ContainerMarkerCache } from '../src/sandbox/cache.js';
import {
  DependencyResolver, firstDeclaredPackage, hashContent, installCommand,
  type DependencyManifest, type ManifestFormat,
} from '../src/sandbox/deps.js';
import { GUI_GUIDANCE, distributionFor, guiToolkitsIn } from '../src/sandbox/infer.js';
import { FakeRuntime, fail } from './helpers/fake-runtime.js';

const MARKER = '/sandbox/.healbox-deps.sha256';

function manifest(format: ManifestFormat, path: string, content = ''): DependencyManifest {
  return { path, format, content, hash: hashContent(content), synthesized: false };
}

describe('DependencyResolver.resolve', () => {
  const resolver = new DependencyResolver(new FakeRuntime(), {
    cache: new ContainerMarkerCache(new FakeRuntime(), MARKER),
    installTimeoutMs: 60_000,
    installGuiPackages: true,
  });

  it('prefers requirements.txt over other manifests', () => {
    const decision = resolver.resolve({
      'main.py': 'import requests\n',
      'pyproject.toml': '[project]\nname = "x"\n',
      'requirements.txt': 'requests\n',
    });
    expect(decision).toEqual({
      kind: 'manifest',
      guiToolkits: [],
      manifest: {
        path: 'requirements.txt',
        format: 'requirements',
        content: 'requests\n',
        hash: hashContent('requests\n'),
        synthesized: false,
      },
    });
  });

  it('follows manifest priority when requirements.txt is absent', () => {
    const decision = resolver.resolve({
      'main.py': '',
      'Pipfile': '[packages]\nflask = "*"\n',
      'setup.py': 'from setuptools import setup\n',
    });
    expect(decision.kind === 'manifest' && decision.manifest.path).toBe('setup.py');
  });

  it('infers requirements from imports, skipping stdlib and local modules', () => {
    const decision = resolver.resolve({
      'main.py': 'import os, sys\nimport requests\nfrom PIL import Image\nimport utils\n',
      'utils.py': 'import numpy as np\n',
    });
    expect(decision.kind).toBe('manifest');
    if (decision.kind !== 'manifest') return;
    expect(decision.manifest.synthesized).toBe(true);
    expect(decision.manifest.path).toBe('requirements.txt');
    expect(decision.manifest.content).toBe('# Auto-detected dependencies\nnumpy\npillow\nrequests\n');
  });

  it('adds GUI guidance to an inferred manifest', () => {
    const decision = resolver.resolve({ 'main.py': 'import matplotlib.pyplot as plt\n' });
    expect(decision.guiToolkits).toEqual(['matplotlib']);
    expect(decision.kind === 'manifest' && decision.manifest.content).toBe(
      ['# Auto-detected dependencies', 'matplotlib', '', ...GUI_GUIDANCE].join('\n') + '\n',
    );
  });

  it('returns none when only the standard library is used', () => {
    expect(resolver.resolve({ 'main.py': 'import json\nimport tkinter\n' })).toEqual({
      kind: 'none',
      guiToolkits: ['tkinter'],
    });
  });
});

describe('DependencyResolver.install', () => {
  let runtime: FakeRuntime;
  let resolver: DependencyResolver;

  const files = (requirements: string) => ({ 'main.py': 'import requests\n', 'requirements.txt': requirements });

  beforeEach(async () => {
    runtime = new FakeRuntime();
    resolver = new DependencyResolver(runtime, {
      cache: new ContainerMarkerCache(runtime, MARKER),
      installTimeoutMs: 60_000,
      installGuiPackages: true,
    });
    await runtime.ensureRunning('s1');
  });

  it('installs once, then skips while the manifest hash is unchanged', async () => {
    const decision = resolver.resolve(files('requests==2.31.0\n'));

    const first = await resolver.install('s1', decision);
    expect(first.kind).toBe('ran');
    expect(runtime.containers.get('s1')?.files.get(MARKER)).toBe(hashContent('requests==2.31.0\n'));

    const second = await resolver.install('s1', decision);
    expect(second).toEqual({ kind: 'skip', reason: 'cache-hit' });
    expect(runtime.ran('pip', 'install', '-r', 'requirements.txt')).toHaveLength(1);
    expect(runtime.ran('pip', 'show', '-q', 'requests')).toHaveLength(1);
  });

  it('reinstalls after a one-character manifest change', async () => {
    await resolver.install('s1', resolver.resolve(files('requests==2.31.0\n')));
    const outcome = await resolver.install('s1', resolver.resolve(files('requests==2.31.1\n')));
    expect(outcome.kind).toBe('ran');
    expect(runtime.ran('pip', 'install', '-r')).toHaveLength(2);
  });

  it('reinstalls when the sentinel package is missing despite a matching hash', async () => {
    const decision = resolver.resolve(files('requests\n'));
    await resolver.install('s1', decision);
    runtime.onExec(cmd => (cmd[0] === 'pip' && cmd[1] === 'show' ? fail('WARNING: Package(s) not found') : undefined));

    const outcome = await resolver.install('s1', decision);
    expect(outcome.kind).toBe('ran');
    expect(runtime.ran('pip', 'install', '-r')).toHaveLength(2);
  });

  it('does not record the hash when installation fails', async () => {
    runtime.onExec(cmd => (cmd[1] === 'install' ? fail('ERROR: No matching distribution found for nosuchpkg') : undefined));
    const decision = resolver.resolve(files('nosuchpkg\n'));

    const outcome = await resolver.install('s1', decision);
    expect(outcome).toEqual({
      kind: 'ran',
      result: { stdout: '', stderr: 'ERROR: No matching distribution found for nosuchpkg', exitCode: 1 },
    });
    expect(runtime.containers.get('s1')?.files.has(MARKER)).toBe(false);

    await resolver.install('s1', decision);
    expect(runtime.ran('pip', 'install', '-r')).toHaveLength(2);
  });

  it('skips when there is nothing to install', async () => {
    const outcome = await resolver.install('s1', resolver.resolve({ 'main.py': 'print("hi")\n' }));
    expect(outcome).toEqual({ kind: 'skip', reason: 'no-manifest' });
    expect(runtime.commands).toHaveLength(0);
  });

  it('installs GUI system packages once per session', async () => {
    const decision = resolver.resolve({ 'main.py': 'import tkinter\n' });
    await resolver.install('s1', decision);
    await resolver.install('s1', decision);
    const apt = runtime.ran('sh', '-c', 'apt-get update && apt-get install -y python3-tk python3-dev');
    expect(apt).toHaveLength(1);
  });

  it('leaves GUI system packages alone when disabled', async () => {
    const quiet = new DependencyResolver(runtime, {
      cache: new ContainerMarkerCache(runtime, MARKER),
      installTimeoutMs: 60_000,
      installGuiPackages: false,
    });
    await quiet.install('s1', quiet.resolve({ 'main.py': 'import tkinter\n' }));
    expect(runtime.commands).toHaveLength(0);
  });
});

describe('installCommand', () => {
  it('maps each manifest format to its installer', () => {
    expect(installCommand(manifest('requirements', 'requirements.txt'))).toEqual(['pip', 'install', '-r', 'requirements.txt']);
    expect(installCommand(manifest('pyproject', 'pyproject.toml'))).toEqual(['pip', 'install', '-e', '.']);
    expect(installCommand(manifest('setup', 'setup.py'))).toEqual(['pip', 'install', '-e', '.']);
    expect(installCommand(manifest('pipfile', 'Pipfile'))).toEqual([
      'sh', '-c', 'pip install -q pipenv && pipenv install --system --skip-lock',
    ]);
    expect(installCommand(manifest('poetry-lock', 'poetry.lock'))).toEqual([
      'sh', '-c', 'pip install -q poetry && poetry config virtualenvs.create false && poetry install --no-root',
    ]);
  });
});

describe('python data tables', () => {
  it('maps import names to distributions read from the bundled tables', () => {
    expect(distributionFor('cv2')).toBe('opencv-python');
    expect(distributionFor('yaml')).toBe('pyyaml');
    expect(distributionFor('requests')).toBe('requests');
    expect(guiToolkitsIn(['os', 'tkinter', 'pygame'])).toEqual(['tkinter', 'pygame']);
  });
});

describe('firstDeclaredPackage', () => {
  it('reads the first requirement, skipping comments and options', () => {
    const m = manifest('requirements', 'requirements.txt', '# deps\n-r base.txt\nnumpy>=1.26\npandas\n');
    expect(firstDeclaredPackage(m)).toBe('numpy');
  });

  it('skips VCS, URL and direct-reference requirements', () => {
    const m = manifest('requirements', 'requirements.txt',
      'git+https://example.com/org/tool.git#egg=tool\nhttps://example.com/pkg-1.0.tar.gz\n'
      + 'demo @ file:///tmp/demo\nrequests==2.32.3\n');
    expect(firstDeclaredPackage(m)).toBe('requests');
    expect(firstDeclaredPackage(manifest('requirements', 'requirements.txt',
      'git+https://example.com/org/tool.git\n'))).toBeUndefined();
  });

  it('reads pyproject, setup.py, Pipfile and poetry.lock', () => {
    expect(firstDeclaredPackage(manifest('pyproject', 'pyproject.toml',
      '[project]\nname = "demo"\ndependencies = [\n  "httpx>=0.27",\n  "rich",\n]\n'))).toBe('httpx');
    expect(firstDeclaredPackage(manifest('setup', 'setup.py',
      'setup(name="demo", install_requires=["click>=8", "rich"])\n'))).toBe('click');
    expect(firstDeclaredPackage(manifest('pipfile', 'Pipfile',
      '[[source]]\nurl = "https://pypi.org/simple"\n\n[packages]\nflask = "*"\n'))).toBe('flask');
    expect(firstDeclaredPackage(manifest('poetry-lock', 'poetry.lock',
      '[[package]]\nname = "certifi"\nversion = "2024.2.2"\n'))).toBe('certifi');
  });

  it('returns undefined for an empty manifest', () => {
    expect(firstDeclaredPackage(manifest('requirements', 'requirements.txt', '# nothing\n'))).toBeUndefined();
  });
});
