import type { FileSet, RunPhase } from '../types.js';
import { formatFileBlock } from './patch-parser.js';

export interface FixPromptContext {
  files: FileSet;
  entryPoint: string;
  stderr: string;
  stdout: string;
  phase: RunPhase;
}

// Keeps the prompt bounded when a run floods stdout/stderr.
const MAX_OUTPUT_CHARS = 8_000;

function tail(text: string): string {
  return text.length > MAX_OUTPUT_CHARS ? `...\n${text.slice(-MAX_OUTPUT_CHARS)}` : text;
}

export const FIX_SYSTEM_PROMPT = `You are an expert developer and code reviewer.
You repair projects that failed to run or to pass their tests inside an isolated Python container.
You answer only with replacement files in the requested block format.`;

export function buildFixPrompt(ctx: FixPromptContext): string {
  const sections: string[] = [];

  sections.push(`The following project failed. Entry point: ${ctx.entryPoint}.`);

  if (ctx.phase === 'install') {
    sections.push(`## The dependency install failed
The program never ran: the package manager exited with an error.
- Fix the dependency manifest first (requirements.txt, pyproject.toml, ...).
- Reorder packages whose build needs another package installed first.
- Pin compatible versions, add missing packages and drop conflicting ones.`);
  }

  sections.push(`## Your task
1. Analyze the error below.
2. Fix the cause, plus any missing imports or syntax errors you notice.
3. If you change a file, update every related file so the project stays consistent.
4. The sandbox has no display: console programs only.`);

  sections.push(`## Answer format
Return each file that needs changes as:
<<FILENAME:path/to/file.ext>>
<complete file content>
<<END>>

Repeat for each changed file. Return complete files, not diffs. No explanations.`);

  const blocks = Object.entries(ctx.files).map(([path, content]) => formatFileBlock(path, content));
  sections.push(`## Files
${blocks.join('\n')}`);

  sections.push(`## Error
${tail(ctx.stderr) || '(no stderr)'}`);

  if (ctx.stdout.trim()) {
    sections.push(`## Output
${tail(ctx.stdout)}`);
  }

  return sections.join('\n\n');
}
