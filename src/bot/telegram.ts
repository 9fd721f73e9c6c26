/**
 * Telegram transport: a grammy long-polling bot with one engine per user.
 * Gated tools are auto-approved here; there is no one to ask mid-turn.
 */

import { Bot, GrammyError, HttpError, type Context } from 'grammy';
import type { Config } from '../config.ts';
import { AutoApproveGate } from '../approval/index.ts';
import { ConversationEngine } from '../engine.ts';
import { errorMessage } from '../errors.ts';
import { SessionStore } from '../session/store.ts';
import { MEMORY_FILE } from '../project/index.ts';
import { TELEGRAM_CHUNK, escapeHtml, markdownToTelegramHtml, splitMessage, stripToolBlocks } from './format.ts';

export type EngineSessions = SessionStore<number, ConversationEngine>;

// What the status replies read from an engine
export interface EngineStatus {
  model: string;
  messageCount: number;
  estimatedTokens: number;
  hasProjectMemory: boolean;
}

const log = (message: string) => console.log(`[bot] ${message}`);
const logError = (message: string) => console.error(`[bot] ${message}`);

// An empty allow-list admits everyone
export function isAllowed(userId: number, allowed: readonly number[]): boolean {
  return allowed.length === 0 || allowed.includes(userId);
}

export function welcomeMessage(firstName: string, status: EngineStatus, config: Config): string {
  const memory = status.hasProjectMemory ? `📋 ${MEMORY_FILE} loaded` : `📋 ${MEMORY_FILE} not found`;
  return [
    `👋 Hello, <b>${escapeHtml(firstName)}</b>!`,
    '',
    `I'm the <b>lathe</b> coding assistant.`,
    `🤖 Model: <code>${escapeHtml(status.model)}</code>`,
    `📊 Max tokens: <code>${config.maxContextTokens}</code>`,
    memory,
    '',
    'Send me your coding questions!',
    '',
    '<b>Commands:</b>',
    '/clear - Reset conversation',
    '/help - Help',
    '/model - Model info',
  ].join('\n');
}

export const HELP_MESSAGE = [
  '📖 <b>lathe help</b>',
  '',
  'Send a message to chat with the coding assistant.',
  '',
  '<b>Features:</b>',
  '• Code writing and review',
  '• File read/write/edit (diff-based)',
  '• File content search (grep)',
  '• Command execution',
  `• ${MEMORY_FILE} project memory`,
  '',
  '<b>Commands:</b>',
  '/start - Start',
  '/clear - Reset conversation',
  '/model - Model and token info',
  '/help - This help',
].join('\n');

export function modelInfoMessage(status: EngineStatus, config: Config): string {
  return [
    '🤖 <b>Model Info</b>',
    '',
    `Model: <code>${escapeHtml(status.model)}</code>`,
    `Server: <code>${escapeHtml(config.ollamaHost)}</code>`,
    `Messages: <code>${status.messageCount}</code>`,
    `Est. tokens: <code>${status.estimatedTokens}</code> / ${config.maxContextTokens}`,
    `Compact mode: <code>${config.compactMode}</code>`,
    `Project memory: <code>${status.hasProjectMemory ? 'loaded' : 'none'}</code>`,
  ].join('\n');
}

export interface RenderedReply {
  html: string[];
  // Sent instead when Telegram rejects the HTML
  plain: string[];
}

export function renderReply(response: string): RenderedReply {
  const text = stripToolBlocks(response) || '(empty response)';
  return {
    html: splitMessage(markdownToTelegramHtml(text), TELEGRAM_CHUNK),
    plain: splitMessage(text, TELEGRAM_CHUNK),
  };
}

async function sendReply(ctx: Context, response: string): Promise<void> {
  const { html, plain } = renderReply(response);
  try {
    for (const part of html) {
      await ctx.reply(part, { parse_mode: 'HTML' });
    }
  } catch (error) {
    if (!(error instanceof GrammyError)) throw error;
    logError(`HTML reply rejected (${error.description}), sending plain text`);
    for (const part of plain) {
      await ctx.reply(part);
    }
  }
}

export function createSessions(config: Config): EngineSessions {
  const sessions: EngineSessions = new SessionStore(userId => {
    log(`new session for user ${userId} (${sessions.size} active)`);
    return ConversationEngine.create(config, { approval: new AutoApproveGate() });
  });
  return sessions;
}

export function createTelegramBot(config: Config, sessions: EngineSessions = createSessions(config)): Bot {
  const bot = new Bot(config.telegramBotToken);

  // Auth
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (userId === undefined || !isAllowed(userId, config.telegramAllowedUsers)) {
      log(`ignored update from unauthorized user ${userId ?? 'unknown'}`);
      if (ctx.message) await ctx.reply('⛔ Access denied.');
      return;
    }
    await next();
  });

  bot.command('start', async ctx => {
    const user = ctx.from;
    if (!user) return;
    const engine = await sessions.get(user.id);
    await ctx.reply(welcomeMessage(user.first_name, engine, config), { parse_mode: 'HTML' });
  });

  bot.command('help', async ctx => {
    await ctx.reply(HELP_MESSAGE, { parse_mode: 'HTML' });
  });

  bot.command('clear', async ctx => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    await sessions.run(userId, async engine => engine.clear());
    await ctx.reply('✅ Conversation history cleared.');
  });

  bot.command('model', async ctx => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    const engine = await sessions.get(userId);
    await ctx.reply(modelInfoMessage(engine, config), { parse_mode: 'HTML' });
  });

  bot.on('message:text', async ctx => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    const text = ctx.message.text;

    if (sessions.isBusy(userId)) log(`user ${userId} is busy, queueing message`);
    await ctx.replyWithChatAction('typing');

    let response: string;
    try {
      response = await sessions.run(userId, async engine => {
        const reply = await engine.respond(text);
        const usage = engine.lastUsage;
        if (usage) log(`user ${userId}: ${usage.promptTokens} prompt / ${usage.outputTokens} output tokens`);
        return reply;
      });
    } catch (error) {
      logError(`chat error for user ${userId}: ${errorMessage(error)}`);
      await ctx.reply(`❌ Error:\n<code>${escapeHtml(errorMessage(error))}</code>`, { parse_mode: 'HTML' });
      return;
    }

    await sendReply(ctx, response);
  });

  bot.catch(err => {
    const { error } = err;
    if (error instanceof GrammyError) {
      logError(`Telegram API error: ${error.description}`);
    } else if (error instanceof HttpError) {
      logError(`could not reach Telegram: ${errorMessage(error.error)}`);
    } else {
      logError(`unhandled error for update ${err.ctx.update.update_id}: ${errorMessage(error)}`);
    }
  });

  return bot;
}

export async function startTelegramBot(config: Config): Promise<void> {
  if (!config.telegramBotToken) {
    throw new Error('TELEGRAM_BOT_TOKEN is not set. Create a bot via @BotFather and export its token.');
  }

  const bot = createTelegramBot(config);
  const allowed = config.telegramAllowedUsers.length > 0 ? config.telegramAllowedUsers.join(', ') : 'all';

  log('starting Telegram bot');
  log(`Model: ${config.model} | Server: ${config.ollamaHost}`);
  log(`Allowed users: ${allowed}`);
  log(`Workspace: ${config.workspaceDir}`);
  log(`Max tokens: ${config.maxContextTokens} | Compact mode: ${config.compactMode}`);

  const stop = () => {
    log('stopping');
    void bot.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await bot.start({
    onStart: info => log(`polling as @${info.username}`),
  });
}
