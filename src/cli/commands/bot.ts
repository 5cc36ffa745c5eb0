/**
 * Bot command: run the Telegram front end
 */

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { createBot, registerCommands } from '../../bot/bot.js';
import { isLogLevel, logger } from '../../utils/logger.js';

export const botCommand = new Command('bot')
  .description('Start the Telegram bot (reads BOT_TOKEN from the environment or .env)')
  .option('--resolvers <ips...>', 'DNS servers to query instead of the system resolver')
  .action(async (options: { resolvers?: string[] }) => {
    // Load environment variables (bot token, log level, session TTL)
    dotenv.config();

    const token = process.env.BOT_TOKEN;
    if (!token) {
      console.error(chalk.red('\n❌ BOT_TOKEN is not set\n'));
      process.exit(1);
    }

    const level = process.env.LOG_LEVEL;
    if (isLogLevel(level)) {
      logger.setLevel(level);
    }

    const ttl = Number(process.env.SESSION_TTL_MS);
    const { bot, sessions } = createBot({
      token,
      sessionTtl: Number.isFinite(ttl) && ttl > 0 ? ttl : undefined,
      resolvers: options.resolvers,
    });

    const shutdown = (signal: string) => {
      const aborted = sessions.abortAll();
      logger.info(`${signal} received, stopping bot (${aborted} scans aborted)`);
      bot.stop(signal);
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await registerCommands(bot.telegram);
    await bot.launch(() => {
      logger.success('Bot is running');
    });
  });
