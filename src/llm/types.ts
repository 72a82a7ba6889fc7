export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type LLMEvent =
  | { type: 'text_delta'; content: string }
  | { type: 'done'; usage?: { input_tokens: number; output_tokens: number } }
  | { type: 'error'; error: string };

export interface LLMAdapter {
  provider: string;
  chat(messages: Message[]): AsyncIterable<LLMEvent>;
}

export interface LLMConfig {
  provider: 'openai' | 'anthropic' | 'ollama';
  model: string;
  apiKey: string;
  baseUrl?: string;
}
