import { z } from 'zod';
import type { LLMAdapter, LLMConfig, LLMEvent, Message } from './types.js';

const ChatResponse = z.object({
  message: z.object({ content: z.string() }).optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaAdapter implements LLMAdapter {
  provider = 'ollama';
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  async *chat(messages: Message[]): AsyncIterable<LLMEvent> {
    const baseUrl = this.config.baseUrl || 'http://localhost:11434';
    const res = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.config.model,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        stream: false,
      }),
    });

    if (!res.ok) {
      yield { type: 'error', error: `Ollama error: ${res.status} ${await res.text()}` };
      return;
    }

    const parsed = ChatResponse.safeParse(await res.json());
    if (!parsed.success) {
      yield { type: 'error', error: `Unexpected Ollama response: ${parsed.error.message}` };
      return;
    }
    const { message, prompt_eval_count, eval_count } = parsed.data;
    if (message?.content) {
      yield { type: 'text_delta', content: message.content };
    }
    yield {
      type: 'done',
      usage: prompt_eval_count !== undefined && eval_count !== undefined
        ? { input_tokens: prompt_eval_count, output_tokens: eval_count }
        : undefined,
    };
  }
}
