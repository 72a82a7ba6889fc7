import { readFileSync, writeFileSync, existsSync, mkdirSync, readdirSync, statSync } from 'fs';
import { dirname, join, relative, sep } from 'path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import type { FileSet } from '../types.js';

const IGNORED_DIRS = new Set(['.git', 'node_modules', '__pycache__', '.venv', 'venv', '.healbox', '.pytest_cache']);
const MAX_FILE_BYTES = 512 * 1024;

const ProjectConfigSchema = z.object({
  entry: z.string().optional(),
  maxAttempts: z.number().int().min(1).optional(),
  timeout: z.number().positive().optional(),
  image: z.string().optional(),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Reads `.healbox/config.yaml` from the project root; a missing file means no overrides. */
export function loadProjectConfig(dir: string): ProjectConfig {
  const configPath = join(dir, '.healbox', 'config.yaml');
  if (!existsSync(configPath)) return {};
  const raw = loadYaml(readFileSync(configPath, 'utf-8'));
  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid ${configPath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

/** Every text file under `dir`, keyed by its `/`-separated relative path. */
export function readFileSet(dir: string): FileSet {
  const files: FileSet = {};
  const walk = (current: string) => {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const abs = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) walk(abs);
        continue;
      }
      if (!entry.isFile() || statSync(abs).size > MAX_FILE_BYTES) continue;
      const buf = readFileSync(abs);
      if (buf.includes(0)) continue;   // binary
      files[relative(dir, abs).split(sep).join('/')] = buf.toString('utf-8');
    }
  };
  walk(dir);
  return files;
}

export function writeFileSet(dir: string, files: FileSet): string[] {
  const written: string[] = [];
  for (const [path, content] of Object.entries(files)) {
    const abs = join(dir, path);
    if (existsSync(abs) && readFileSync(abs, 'utf-8') === content) continue;
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content, 'utf-8');
    written.push(path);
  }
  return written;
}
