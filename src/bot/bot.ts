/**
 * Telegram front end: drives one scan per user through the session machine
 */

import { Input, Markup, Telegraf } from 'telegraf';
import type { Context, Telegram } from 'telegraf';
import { message } from 'telegraf/filters';
import { App } from '../core/app.js';
import type { Verifier } from '../core/verifier.js';
import { isMode, MODES } from '../core/modes.js';
import { formatText, reportFileName } from '../core/report.js';
import { logger } from '../utils/logger.js';
import { SessionStore } from './session-store.js';
import * as text from './messages.js';
import type { Domain, Mode } from '../core/types.js';
import type { Outcome } from './session.js';

export interface BotOptions {
  token: string;
  /** Idle session expiry in milliseconds */
  sessionTtl?: number;
  /** DNS servers for every scan */
  resolvers?: string[];
  /** Verifier shared by every scan; a default one is built per scan otherwise */
  verifier?: Verifier;
  /** Passed to the Telegram API client (API root, HTTP agent) */
  telegram?: Telegraf.Options<Context>['telegram'];
}

/** Command menu shown by Telegram clients */
export const BOT_COMMANDS = [
  { command: 'start', description: 'Show the main menu' },
  { command: 'help', description: 'Show help' },
  { command: 'cancel', description: 'Cancel the current operation or running scan' },
];

const ACTION_BEGIN = 'begin';
const ACTION_HELP = 'help';
const ACTION_BACK = 'back';
const ACTION_CONFIRM = 'confirm';
const ACTION_CANCEL = 'cancel';
const MODE_ACTION = /^mode:(.+)$/;

/** Minimum gap between progress edits of the status message */
const PROGRESS_INTERVAL_MS = 3000;

const menuKeyboard = Markup.inlineKeyboard([
  [Markup.button.callback('🚀 Start Scan', ACTION_BEGIN)],
  [Markup.button.callback('📚 Help', ACTION_HELP)],
]);

const backKeyboard = Markup.inlineKeyboard([
  [Markup.button.callback('↩️ Back to Menu', ACTION_BACK)],
]);

const modeKeyboard = Markup.inlineKeyboard([
  MODES.map((mode) => Markup.button.callback(text.modeLabel(mode), `mode:${mode}`)),
  [Markup.button.callback('↩️ Back', ACTION_BACK)],
]);

const confirmKeyboard = Markup.inlineKeyboard([
  [
    Markup.button.callback('✅ Start Scan', ACTION_CONFIRM),
    Markup.button.callback('❌ Cancel', ACTION_CANCEL),
  ],
  [Markup.button.callback('↩️ Back', ACTION_BACK)],
]);

const stopKeyboard = Markup.inlineKeyboard([[Markup.button.callback('🛑 Stop', ACTION_CANCEL)]]);

/**
 * Publish the command menu; call once before launching
 */
export async function registerCommands(telegram: Telegram): Promise<void> {
  await telegram.setMyCommands(BOT_COMMANDS);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createBot(options: BotOptions) {
  const bot = new Telegraf(options.token, { telegram: options.telegram });
  const sessions = new SessionStore(options.sessionTtl);

  /**
   * Reply (or edit the pressed message) for a non-scanning outcome
   */
  const respond = async (ctx: Context, outcome: Outcome, userId: number): Promise<void> => {
    const state = sessions.get(userId);
    const edit = ctx.callbackQuery !== undefined;
    const send = (body: string, keyboard?: ReturnType<typeof Markup.inlineKeyboard>) =>
      edit ? ctx.editMessageText(body, keyboard) : ctx.reply(body, keyboard);

    switch (outcome) {
      case 'ask-domain':
        await send(text.ASK_DOMAIN, backKeyboard);
        return;
      case 'invalid-domain':
        await ctx.reply(text.INVALID_DOMAIN, backKeyboard);
        return;
      case 'ask-mode':
        if (state?.step === 'awaiting-mode') {
          await send(text.modeMenu(state.domain), modeKeyboard);
        }
        return;
      case 'ask-confirmation':
        if (state?.step === 'awaiting-confirmation') {
          await send(text.confirmation(state.domain, state.mode), confirmKeyboard);
        }
        return;
      case 'menu':
        await send(text.WELCOME, menuKeyboard);
        return;
      case 'cancelled':
        await send(text.CANCELLED, menuKeyboard);
        return;
      case 'nothing-to-cancel':
        await ctx.reply(text.NOTHING_TO_CANCEL);
        return;
      case 'cancelling':
        await ctx.reply(text.CANCELLING);
        return;
      case 'busy':
        await ctx.reply(text.BUSY);
        return;
      case 'start-scan':
      case 'finished':
      case 'ignored':
        return;
    }
  };

  /**
   * Run a confirmed scan outside the update handler and deliver the results
   */
  const runScan = async (
    ctx: Context,
    userId: number,
    domain: Domain,
    mode: Mode,
    controller: AbortController
  ): Promise<void> => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) {
      sessions.apply(userId, { type: 'finished' });
      return;
    }

    try {
      await ctx
        .editMessageText(text.confirmation(domain, mode))
        .catch((error: unknown) =>
          logger.debug(`Confirmation edit failed: ${describeError(error)}`)
        );

      const status = await ctx.telegram.sendMessage(
        chatId,
        text.scanning(domain, mode, 0, 0),
        stopKeyboard
      );
      let lastEdit = Date.now();

      const updateStatus = (done: number, total: number) => {
        const now = Date.now();
        if (now - lastEdit < PROGRESS_INTERVAL_MS || done === total) {
          return;
        }
        lastEdit = now;
        ctx.telegram
          .editMessageText(
            chatId,
            status.message_id,
            undefined,
            text.scanning(domain, mode, done, total),
            stopKeyboard
          )
          .catch((error: unknown) => logger.debug(`Progress edit failed: ${describeError(error)}`));
      };

      const app = new App(
        {
          domain,
          mode,
          format: 'text',
          quiet: true,
          resolvers: options.resolvers,
        },
        { verifier: options.verifier }
      );
      const report = await app.scan({ signal: controller.signal, onProgress: updateStatus });

      await ctx.telegram
        .editMessageText(chatId, status.message_id, undefined, text.scanFinished(report))
        .catch((error: unknown) => logger.debug(`Status edit failed: ${describeError(error)}`));
      await ctx.telegram.sendMessage(chatId, text.results(report));
      await ctx.telegram.sendDocument(
        chatId,
        Input.fromBuffer(
          Buffer.from(formatText(report), 'utf-8'),
          reportFileName(domain, report.metadata.endTime)
        ),
        { caption: `Results for ${domain}` }
      );
      logger.info(
        `Delivered ${domain} (${mode}) to user ${userId}: ` +
          `${report.dnsResolved.length} resolved, ${report.httpsAlive.length} alive`
      );
    } catch (error) {
      logger.error(`Scan for user ${userId} failed: ${describeError(error)}`);
      await ctx.telegram.sendMessage(chatId, text.scanFailed(error));
    } finally {
      sessions.apply(userId, { type: 'finished' });
    }

    await ctx.telegram.sendMessage(chatId, text.WELCOME, menuKeyboard);
  };

  bot.start(async (ctx) => {
    const userId = ctx.from.id;
    if (sessions.get(userId)?.step === 'scanning') {
      await ctx.reply(text.BUSY);
      return;
    }
    sessions.delete(userId);
    await ctx.reply(text.WELCOME, menuKeyboard);
  });

  bot.help(async (ctx) => {
    await ctx.reply(text.HELP);
  });

  /**
   * Leave the current step, or stop a running scan (its partial results are still sent)
   */
  const cancel = async (ctx: Context, userId: number): Promise<void> => {
    const state = sessions.get(userId);
    const { outcome } = sessions.apply(userId, { type: 'cancel' });
    if (outcome === 'cancelling' && state?.step === 'scanning') {
      state.controller.abort();
    }
    await respond(ctx, outcome, userId);
  };

  bot.command('cancel', async (ctx) => {
    await cancel(ctx, ctx.from.id);
  });

  bot.action(ACTION_HELP, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.reply(text.HELP);
  });

  bot.action(ACTION_BEGIN, async (ctx) => {
    await ctx.answerCbQuery();
    const { outcome } = sessions.apply(ctx.from.id, { type: 'begin' });
    await respond(ctx, outcome, ctx.from.id);
  });

  bot.action(ACTION_BACK, async (ctx) => {
    await ctx.answerCbQuery();
    const { outcome } = sessions.apply(ctx.from.id, { type: 'back' });
    await respond(ctx, outcome, ctx.from.id);
  });

  bot.action(MODE_ACTION, async (ctx) => {
    await ctx.answerCbQuery();
    const mode = ctx.match[1];
    if (!isMode(mode)) {
      return;
    }
    const { outcome } = sessions.apply(ctx.from.id, { type: 'mode', mode });
    await respond(ctx, outcome, ctx.from.id);
  });

  bot.action(ACTION_CONFIRM, async (ctx) => {
    await ctx.answerCbQuery();
    const userId = ctx.from.id;
    const controller = new AbortController();
    const { state, outcome } = sessions.apply(userId, { type: 'confirm', controller });

    if (outcome !== 'start-scan' || state?.step !== 'scanning') {
      await respond(ctx, outcome, userId);
      return;
    }

    runScan(ctx, userId, state.domain, state.mode, controller).catch((error: unknown) => {
      logger.error(`Result delivery for user ${userId} failed: ${describeError(error)}`);
    });
  });

  bot.action(ACTION_CANCEL, async (ctx) => {
    await ctx.answerCbQuery();
    await cancel(ctx, ctx.from.id);
  });

  bot.on(message('text'), async (ctx) => {
    const { outcome } = sessions.apply(ctx.from.id, { type: 'domain', text: ctx.message.text });
    await respond(ctx, outcome, ctx.from.id);
  });

  bot.catch((error, ctx) => {
    logger.error(`Update ${ctx.update.update_id} failed: ${describeError(error)}`);
  });

  return { bot, sessions };
}
