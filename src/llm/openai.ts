import { z } from 'zod';
import type { LLMAdapter, LLMConfig, LLMEvent, Message } from './types.js';

const ChatCompletion = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
});

export class OpenAIAdapter implements LLMAdapter {
  provider = 'openai';
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  async *chat(messages: Message[]): AsyncIterable<LLMEvent> {
    const baseUrl = this.config.baseUrl || 'https://api.openai.com/v1';
    const res = await fetch(`${baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
      }),
    });

    if (!res.ok) {
      yield { type: 'error', error: `OpenAI API error: ${res.status} ${await res.text()}` };
      return;
    }

    const parsed = ChatCompletion.safeParse(await res.json());
    if (!parsed.success) {
      yield { type: 'error', error: `Unexpected OpenAI response: ${parsed.error.message}` };
      return;
    }
    const choice = parsed.data.choices[0];
    if (!choice) {
      yield { type: 'error', error: 'No choices in response' };
      return;
    }

    if (choice.message.content) {
      yield { type: 'text_delta', content: choice.message.content };
    }
    const usage = parsed.data.usage;
    yield {
      type: 'done',
      usage: usage && { input_tokens: usage.prompt_tokens, output_tokens: usage.completion_tokens },
    };
  }
}
