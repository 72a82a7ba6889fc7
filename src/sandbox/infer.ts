import { readFileSync } from 'fs';
import { z } from 'zod';
import type { FileSet } from '../types.js';

export interface InferredManifest {
  path: string;
  content: string;
  packages: string[];
}

/**
 * Builds a manifest from source files when the project ships none.
 * Swappable so the resolver's caching logic never depends on how imports are read.
 */
export type InferenceStrategy = (files: FileSet) => InferredManifest | undefined;

const PythonTablesSchema = z.object({
  stdlib: z.array(z.string()),
  distributions: z.record(z.string()),
  guiToolkits: z.array(z.string()),
});

const pythonData = PythonTablesSchema.parse(
  JSON.parse(readFileSync(new URL('./data/python.json', import.meta.url), 'utf-8')),
);

const STDLIB = new Set<string>(pythonData.stdlib);
const DISTRIBUTIONS: Record<string, string> = pythonData.distributions;
const GUI_TOOLKITS = new Set<string>(pythonData.guiToolkits);

const FROM_PATTERN = /^[ \t]*from[ \t]+([A-Za-z_]\w*)/gm;
const IMPORT_PATTERN = /^[ \t]*import[ \t]+([^\n#;]+)/gm;

export const GUI_GUIDANCE = [
  '# GUI dependencies detected - may require system packages',
  '# For tkinter: apt-get install python3-tk',
  '# For matplotlib: apt-get install python3-tk python3-dev',
];

/** Top-level module names imported by the `.py` files, in first-seen order. */
export function scanImports(files: FileSet): string[] {
  const seen = new Set<string>();
  for (const [path, content] of Object.entries(files)) {
    if (!path.endsWith('.py')) continue;
    for (const m of content.matchAll(FROM_PATTERN)) seen.add(m[1]);
    for (const m of content.matchAll(IMPORT_PATTERN)) {
      for (const part of m[1].split(',')) {
        const name = part.trim().match(/^([A-Za-z_]\w*)/);
        if (name) seen.add(name[1]);
      }
    }
  }
  return [...seen];
}

export function guiToolkitsIn(modules: string[]): string[] {
  return modules.filter(m => GUI_TOOLKITS.has(m));
}

/** Module names the project itself provides, e.g. `utils` for `utils.py` or `pkg/`. */
export function localModules(files: FileSet): Set<string> {
  const names = new Set<string>();
  for (const path of Object.keys(files)) {
    const [first, ...rest] = path.split('/');
    if (rest.length > 0) names.add(first);
    else if (first.endsWith('.py')) names.add(first.slice(0, -3));
  }
  return names;
}

export function distributionFor(module: string): string {
  return DISTRIBUTIONS[module] ?? module;
}

export const inferPythonRequirements: InferenceStrategy = (files) => {
  const local = localModules(files);
  const imports = scanImports(files);
  const packages = [...new Set(
    imports
      .filter(m => !STDLIB.has(m) && !local.has(m))
      .map(distributionFor),
  )].sort();
  if (packages.length === 0) return undefined;

  const lines = ['# Auto-detected dependencies', ...packages];
  if (guiToolkitsIn(imports).length > 0) {
    lines.push('', ...GUI_GUIDANCE);
  }
  return { path: 'requirements.txt', content: lines.join('\n') + '\n', packages };
};
