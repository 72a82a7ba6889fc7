import { describe, it, expect, beforeEach } from 'vitest';
import {
  CommandExecutor, GUI_NOTE, annotateStderr, findTestFiles, looksLikeServer, planCommand,
} from '../src/sandbox/executor.js';
import { FakeRuntime, fail, ok } from './helpers/fake-runtime.js';

const FLASK_APP = 'from flask import Flask\napp = Flask(__name__)\napp.run()\n';

describe('findTestFiles', () => {
  it('matches test_*.py and *_test.py at any depth, sorted', () => {
    expect(findTestFiles({
      'main.py': '',
      'test_app.py': '',
      'tests/util_test.py': '',
      'testing.py': '',
      'pkg/test_x.py': '',
      'test_notes.txt': '',
    })).toEqual(['pkg/test_x.py', 'test_app.py', 'tests/util_test.py']);
  });
});

describe('planCommand', () => {
  it('runs the entry point when there are no tests', () => {
    expect(planCommand({ 'main.py': 'print(1)\n' }, 'main.py', 540, 60)).toEqual({
      command: ['python', 'main.py'], timeoutSec: 540, kind: 'entry', clamped: false,
    });
  });

  it('runs pytest over the test files when present', () => {
    const plan = planCommand({ 'main.py': '', 'test_main.py': '', 'b_test.py': '' }, 'main.py', 540, 60);
    expect(plan.command).toEqual(['python', '-m', 'pytest', 'b_test.py', 'test_main.py', '--tb=short']);
    expect(plan.kind).toBe('tests');
  });

  it('clamps the timeout for server frameworks', () => {
    expect(planCommand({ 'app.py': FLASK_APP }, 'app.py', 540, 60)).toEqual({
      command: ['python', 'app.py'], timeoutSec: 60, kind: 'entry', clamped: true,
    });
  });

  it('never raises the timeout above the requested one', () => {
    const plan = planCommand({ 'app.py': FLASK_APP }, 'app.py', 30, 60);
    expect(plan.timeoutSec).toBe(30);
    expect(plan.clamped).toBe(false);
  });
});

describe('looksLikeServer', () => {
  it('detects common server frameworks', () => {
    expect(looksLikeServer({ 'api.py': 'from fastapi import FastAPI\n' })).toBe(true);
    expect(looksLikeServer({ 'run.py': 'import uvicorn\n' })).toBe(true);
    expect(looksLikeServer({ 'manage.py': 'execute_from_command_line(sys.argv)\n' })).toBe(true);
    expect(looksLikeServer({ 'main.py': 'print("flask")\n' })).toBe(false);
  });
});

describe('annotateStderr', () => {
  it('appends the GUI note to failed toolkit imports', () => {
    const stderr = '_tkinter.TclError: no display name and no $DISPLAY environment variable';
    expect(annotateStderr({ stdout: '', stderr, exitCode: 1 }).stderr).toBe(stderr + GUI_NOTE);
  });

  it('leaves successful runs and other errors alone', () => {
    const okRun = { stdout: 'tkinter ready', stderr: 'tkinter warning', exitCode: 0 };
    expect(annotateStderr(okRun)).toBe(okRun);
    const other = { stdout: '', stderr: 'NameError: name "x" is not defined', exitCode: 1 };
    expect(annotateStderr(other)).toBe(other);
  });
});

describe('CommandExecutor', () => {
  let runtime: FakeRuntime;
  let executor: CommandExecutor;

  beforeEach(async () => {
    runtime = new FakeRuntime();
    executor = new CommandExecutor(runtime, 60);
    await runtime.ensureRunning('s1');
  });

  it('runs the entry point with the timeout in milliseconds', async () => {
    runtime.onExec(cmd => (cmd[0] === 'python' ? ok('hello\n') : undefined));
    const result = await executor.execute('s1', { 'main.py': 'print("hello")\n' }, 'main.py', 540);
    expect(result).toEqual({ stdout: 'hello\n', stderr: '', exitCode: 0 });
    expect(runtime.commands).toEqual([{ sessionId: 's1', command: ['python', 'main.py'], timeoutMs: 540_000 }]);
  });

  it('installs pytest before running tests when it is missing', async () => {
    runtime.onExec(cmd => (cmd[1] === '-c' ? fail("ModuleNotFoundError: No module named 'pytest'") : undefined));
    await executor.execute('s1', { 'main.py': '', 'test_main.py': '' }, 'main.py', 540);
    expect(runtime.commands.map(c => c.command.join(' '))).toEqual([
      'python -c import pytest',
      'pip install -q pytest',
      'python -m pytest test_main.py --tb=short',
    ]);
  });

  it('returns the runner install failure without running tests', async () => {
    runtime.onExec(cmd => (cmd[0] !== 'python' || cmd[1] === '-c' ? fail('no network', 2) : undefined));
    const result = await executor.execute('s1', { 'main.py': '', 'test_main.py': '' }, 'main.py', 540);
    expect(result).toEqual({ stdout: '', stderr: 'no network', exitCode: 2 });
    expect(runtime.ran('python', '-m', 'pytest')).toHaveLength(0);
  });

  it('annotates GUI failures from the run', async () => {
    runtime.onExec(() => fail('ModuleNotFoundError: No module named tkinter'));
    const result = await executor.execute('s1', { 'main.py': 'import tkinter\n' }, 'main.py', 540);
    expect(result.stderr).toBe('ModuleNotFoundError: No module named tkinter' + GUI_NOTE);
  });
});
