// lathe configuration

import { resolve } from 'path';
import { z } from 'zod';

const booleanFlag = z
  .string()
  .transform(v => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

const userIdList = z
  .string()
  .transform(v =>
    v
      .split(',')
      .map(id => id.trim())
      .filter(id => /^\d+$/.test(id))
      .map(Number),
  );

const envSchema = z.object({
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('qwen3-coder:30b'),
  WORKSPACE_DIR: z.string().default('.'),

  // Context settings
  MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(8192),
  CONTEXT_LENGTH: z.coerce.number().int().positive().optional(),
  COMPACT_MODE: booleanFlag.default('true'),

  // Generation settings
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  SEED: z.coerce.number().int().optional(),

  // Telegram transport
  TELEGRAM_BOT_TOKEN: z.string().default(''),
  TELEGRAM_ALLOWED_USERS: userIdList.default(''),
});

export interface Config {
  ollamaHost: string;
  model: string;
  workspaceDir: string;
  maxContextTokens: number;
  // num_ctx sent to Ollama; the server default applies when unset
  contextLength: number | undefined;
  compactMode: boolean;
  temperature: number;
  seed: number | undefined;
  telegramBotToken: string;
  telegramAllowedUsers: number[];
}

/**
 * Build a config from environment variables. Empty strings count as unset so
 * that a blank line in a shell profile falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${issues}`);
  }

  const e = parsed.data;
  return {
    ollamaHost: e.OLLAMA_HOST,
    model: e.OLLAMA_MODEL,
    workspaceDir: resolve(cwd, e.WORKSPACE_DIR),
    maxContextTokens: e.MAX_CONTEXT_TOKENS,
    contextLength: e.CONTEXT_LENGTH,
    compactMode: e.COMPACT_MODE,
    temperature: e.TEMPERATURE,
    seed: e.SEED,
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    telegramAllowedUsers: e.TELEGRAM_ALLOWED_USERS,
  };
}
