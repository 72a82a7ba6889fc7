import { findTestFiles } from '../sandbox/executor.js';
import type { FileSet } from '../types.js';

const MAIN_GUARD = /if\s+__name__\s*==\s*["']__main__["']/;

/** Picks the file to run when the caller names none. */
export function detectEntryPoint(files: FileSet): string | undefined {
  if ('main.py' in files) return 'main.py';
  if ('app.py' in files) return 'app.py';

  const tests = new Set(findTestFiles(files));
  const python = Object.keys(files).filter(p => p.endsWith('.py') && !tests.has(p));
  const guarded = python.find(p => MAIN_GUARD.test(files[p]));
  if (guarded) return guarded;

  return python.length === 1 ? python[0] : undefined;
}
