import { describe, it, expect, beforeEach } from 'vitest';
import { PreconditionError } from '../src/errors.js';
import { hashContent } from '../src/sandbox/deps.js';
import { SandboxSession, newSessionId, validateFileSet } from '../src/sandbox/session.js';
import { isTimeout, TIMEOUT_EXIT_CODE } from '../src/types.js';
import { FakeRuntime, fail, ok } from './helpers/fake-runtime.js';

const SYNTAX_ERROR = [
  '  File "/sandbox/main.py", line 1',
  '    print("hi"',
  '         ^',
  "SyntaxError: '(' was never closed",
].join('\n');

describe('SandboxSession', () => {
  let runtime: FakeRuntime;
  let session: SandboxSession;

  beforeEach(() => {
    runtime = new FakeRuntime();
    session = new SandboxSession({
      runtime,
      workspace: '/sandbox',
      timeoutSec: 540,
      serverTimeoutSec: 60,
      installGuiPackages: true,
    });
  });

  it('rejects a missing entry point before any container exists', async () => {
    await expect(session.run({ 'app.py': '' }, 'main.py')).rejects.toBeInstanceOf(PreconditionError);
    expect(runtime.created).toHaveLength(0);
    expect(runtime.commands).toHaveLength(0);
  });

  it('runs the entry point and reports the execute phase', async () => {
    runtime.onExec(cmd => (cmd[0] === 'python' ? ok('hi\n') : undefined));
    const result = await session.run({ 'main.py': 'print("hi")\n' }, 'main.py');
    expect(result).toEqual({ stdout: 'hi\n', stderr: '', exitCode: 0, phase: 'execute' });
    expect(runtime.created).toEqual([session.id]);
    expect(runtime.workspaceFiles(session.id)).toEqual({ 'main.py': 'print("hi")\n' });
  });

  it('returns syntax errors unmodified', async () => {
    runtime.onExec(cmd => (cmd[0] === 'python' ? fail(SYNTAX_ERROR) : undefined));
    const result = await session.run({ 'main.py': 'print("hi"\n' }, 'main.py');
    expect(result).toEqual({ stdout: '', stderr: SYNTAX_ERROR, exitCode: 1, phase: 'execute' });
    expect(isTimeout(result)).toBe(false);
  });

  it('skips execution when dependency installation fails', async () => {
    runtime.onExec(cmd => (cmd[1] === 'install' ? fail('ERROR: ResolutionImpossible') : undefined));
    const result = await session.run({ 'main.py': 'import a\n', 'requirements.txt': 'a\nb\n' }, 'main.py');
    expect(result).toEqual({ stdout: '', stderr: 'ERROR: ResolutionImpossible', exitCode: 1, phase: 'install' });
    expect(runtime.ran('python', 'main.py')).toHaveLength(0);
    expect(session.dependencyHashSeen).toBeUndefined();
  });

  it('pushes an inferred manifest without adding it to the caller files', async () => {
    const files = { 'main.py': 'import requests\n' };
    await session.run(files, 'main.py');
    const inferred = '# Auto-detected dependencies\nrequests\n';
    expect(runtime.workspaceFiles(session.id)['requirements.txt']).toBe(inferred);
    expect(Object.keys(files)).toEqual(['main.py']);
    expect(session.dependencyHashSeen).toBe(hashContent(inferred));
  });

  it('reuses its container and installed dependencies across runs', async () => {
    const files = { 'main.py': 'import requests\n', 'requirements.txt': 'requests\n' };
    await session.run(files, 'main.py');
    await session.run(files, 'main.py');
    expect(runtime.created).toHaveLength(1);
    expect(runtime.ran('pip', 'install', '-r')).toHaveLength(1);
    expect(runtime.ran('python', 'main.py')).toHaveLength(2);
  });

  it('passes the timeout sentinel through as data', async () => {
    runtime.onExec(cmd => (cmd[0] === 'python'
      ? { stdout: 'tick\n', stderr: 'Execution timed out after 540s', exitCode: TIMEOUT_EXIT_CODE }
      : undefined));
    const result = await session.run({ 'main.py': 'while True: print("tick")\n' }, 'main.py');
    expect(isTimeout(result)).toBe(true);
    expect(result.phase).toBe('execute');
  });

  it('removes its container on destroy', async () => {
    await session.run({ 'main.py': '' }, 'main.py');
    await session.destroy();
    expect(runtime.containers.size).toBe(0);
    expect(runtime.destroyed).toEqual([session.id]);
  });

  it('never hands out the same id twice', () => {
    const ids = new Set(Array.from({ length: 1000 }, () => new SandboxSession({
      runtime, workspace: '/sandbox', timeoutSec: 1, serverTimeoutSec: 1, installGuiPackages: false,
    }).id));
    expect(ids.size).toBe(1000);
    expect(newSessionId()).toMatch(/^[0-9a-f]{12}$/);
  });
});

describe('validateFileSet', () => {
  it('rejects paths that escape the workspace', () => {
    expect(() => validateFileSet({ 'main.py': '', '../etc/passwd': '' }, 'main.py')).toThrow(PreconditionError);
    expect(() => validateFileSet({ 'main.py': '', '/abs.py': '' }, 'main.py')).toThrow(PreconditionError);
    expect(() => validateFileSet({ 'main.py': '', 'pkg/mod.py': '' }, 'main.py')).not.toThrow();
  });
});
