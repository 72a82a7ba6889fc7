import { z } from 'zod';
import { join } from 'path';
import { homedir } from 'os';

const ConfigSchema = z.object({
  home: z.string().default(join(homedir(), '.healbox')),
  server: z.object({
    port: z.number().default(3000),
    host: z.string().default('127.0.0.1'),
  }),
  sandbox: z.object({
    image: z.string().default('python:3.11-slim'),
    workspace: z.string().default('/sandbox'),
    containerPrefix: z.string().default('healbox'),
    memory: z.string().default('2g'),
    cpus: z.number().default(2),
    network: z.string().default('bridge'),
    timeoutSec: z.number().default(540),
    serverTimeoutSec: z.number().default(60),
    installGuiPackages: z.boolean().default(true),
  }),
  heal: z.object({
    maxAttempts: z.number().int().min(1).default(5),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'ollama']).default('anthropic'),
    model: z.string().default('claude-3-5-sonnet-20241022'),
    apiKey: z.string().default(''),
    baseUrl: z.string().optional(),
  }),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SandboxSettings = Config['sandbox'];

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    home: env.HEALBOX_HOME || undefined,
    server: {
      port: Number(env.HEALBOX_PORT) || undefined,
      host: env.HEALBOX_HOST || undefined,
    },
    sandbox: {
      image: env.SANDBOX_IMAGE || undefined,
      memory: env.SANDBOX_MEMORY || undefined,
      cpus: Number(env.SANDBOX_CPUS) || undefined,
      network: env.SANDBOX_NETWORK || undefined,
      timeoutSec: Number(env.SANDBOX_TIMEOUT) || undefined,
      serverTimeoutSec: Number(env.SANDBOX_SERVER_TIMEOUT) || undefined,
      installGuiPackages: flag(env.SANDBOX_INSTALL_GUI_PACKAGES),
    },
    heal: {
      maxAttempts: Number(env.HEAL_MAX_ATTEMPTS) || undefined,
    },
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      model: env.LLM_MODEL || undefined,
      apiKey: env.LLM_API_KEY || undefined,
      baseUrl: env.LLM_BASE_URL || undefined,
    },
    logLevel: env.LOG_LEVEL || undefined,
  });
}
