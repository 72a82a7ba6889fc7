import { createLogger } from '../logger.js';
import type { LLMAdapter } from '../llm/types.js';
import type { FileSet, RunPhase } from '../types.js';
import { parsePatchResponse, type PatchParseResult } from './patch-parser.js';
import { FIX_SYSTEM_PROMPT, buildFixPrompt } from './prompts.js';

export interface PatchRequest {
  files: FileSet;
  entryPoint: string;
  stderr: string;
  stdout: string;
  phase: RunPhase;
}

/** Proposes replacement files for a failed run. */
export interface PatchGenerator {
  request(req: PatchRequest): Promise<PatchParseResult>;
}

const log = createLogger('patch');

export class LlmPatchGenerator implements PatchGenerator {
  private llm: LLMAdapter;

  constructor(llm: LLMAdapter) {
    this.llm = llm;
  }

  async request(req: PatchRequest): Promise<PatchParseResult> {
    const prompt = buildFixPrompt(req);
    let text = '';
    for await (const event of this.llm.chat([
      { role: 'system', content: FIX_SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ])) {
      if (event.type === 'text_delta') text += event.content;
      else if (event.type === 'error') {
        log.warn({ provider: this.llm.provider, error: event.error }, 'patch request failed');
        return { kind: 'empty' };
      }
    }

    const parsed = parsePatchResponse(text);
    if (parsed.kind === 'empty') {
      log.warn({ provider: this.llm.provider, chars: text.length }, 'answer contained no file blocks');
    }
    return parsed;
  }
}
