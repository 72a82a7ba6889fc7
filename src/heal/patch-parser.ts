import { isAbsolute } from 'path';
import type { FileSet } from '../types.js';

export type PatchParseResult =
  | { kind: 'ok'; updates: FileSet }
  | { kind: 'empty' };

const BLOCK_PATTERN = /<<FILENAME:(.*?)>>\r?\n([\s\S]*?)<<END>>/g;
const FENCED = /^```[\w.+-]*\r?\n([\s\S]*?)\r?\n```$/;

export function formatFileBlock(path: string, content: string): string {
  return `<<FILENAME:${path}>>\n${content}\n<<END>>`;
}

function isSafePath(path: string): boolean {
  return path !== '' && !isAbsolute(path) && !path.split(/[\\/]/).includes('..');
}

function normalizeContent(raw: string): string {
  let content = raw.trim();
  const fenced = content.match(FENCED);
  if (fenced) content = fenced[1].trim();
  return content === '' ? '' : `${content}\n`;
}

/**
 * Extracts `<<FILENAME:path>> ... <<END>>` blocks from a model answer.
 * Never throws: text outside blocks is ignored and no usable block means `empty`.
 */
export function parsePatchResponse(text: string): PatchParseResult {
  const updates: FileSet = {};
  for (const match of text.matchAll(BLOCK_PATTERN)) {
    const path = match[1].trim();
    if (!isSafePath(path)) continue;
    updates[path] = normalizeContent(match[2]);
  }
  return Object.keys(updates).length > 0 ? { kind: 'ok', updates } : { kind: 'empty' };
}
