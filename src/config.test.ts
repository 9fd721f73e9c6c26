import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.ts';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({}, '/work')).toEqual({
      ollamaHost: 'http://localhost:11434',
      model: 'qwen3-coder:30b',
      workspaceDir: '/work',
      maxContextTokens: 8192,
      contextLength: undefined,
      compactMode: true,
      temperature: 0.7,
      seed: undefined,
      telegramBotToken: '',
      telegramAllowedUsers: [],
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        OLLAMA_HOST: 'http://gpu-box:11434',
        OLLAMA_MODEL: 'llama3:8b',
        WORKSPACE_DIR: 'project',
        MAX_CONTEXT_TOKENS: '4096',
        CONTEXT_LENGTH: '16384',
        COMPACT_MODE: 'false',
        TEMPERATURE: '0.2',
        SEED: '42',
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_ALLOWED_USERS: '123, 456,abc',
      },
      '/work',
    );

    expect(config.ollamaHost).toBe('http://gpu-box:11434');
    expect(config.model).toBe('llama3:8b');
    expect(config.workspaceDir).toBe('/work/project');
    expect(config.maxContextTokens).toBe(4096);
    expect(config.contextLength).toBe(16384);
    expect(config.compactMode).toBe(false);
    expect(config.temperature).toBe(0.2);
    expect(config.seed).toBe(42);
    expect(config.telegramBotToken).toBe('test-token');
    expect(config.telegramAllowedUsers).toEqual([123, 456]);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ OLLAMA_MODEL: '  ', COMPACT_MODE: '' }, '/work');
    expect(config.model).toBe('qwen3-coder:30b');
    expect(config.compactMode).toBe(true);
  });

  it('keeps an absolute workspace as given', () => {
    expect(loadConfig({ WORKSPACE_DIR: '/srv/code' }, '/work').workspaceDir).toBe('/srv/code');
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ MAX_CONTEXT_TOKENS: 'lots' }, '/work')).toThrow(/Invalid configuration:\n {2}MAX_CONTEXT_TOKENS: /);
  });
});
