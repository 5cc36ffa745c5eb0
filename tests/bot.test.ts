/**
 * Tests for the Telegram front end, driven through handleUpdate against a
 * local stand-in for the Bot API
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { Agent, createServer } from 'http';
import type { Server } from 'http';
import type { Update } from 'telegraf/types';
import { BOT_COMMANDS, createBot, registerCommands } from '../src/bot/bot.js';
import * as text from '../src/bot/messages.js';
import { parseDomain } from '../src/core/domain.js';
import { Verifier } from '../src/core/verifier.js';
import { logger } from '../src/utils/logger.js';
import type { HostResolver } from '../src/core/types.js';

const USER_ID = 42;
const user = { id: USER_ID, is_bot: false, first_name: 'Test' };
const chat = { id: USER_ID, type: 'private' as const, first_name: 'Test' };

interface ApiCall {
  method: string;
  payload: unknown;
}

/**
 * Records every Bot API call; methods in `failing` answer with an API error
 */
class FakeBotApi {
  readonly calls: ApiCall[] = [];
  readonly failing = new Set<string>();
  private server: Server;
  private nextMessageId = 100;

  constructor() {
    this.server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const method = (req.url ?? '').split('/').pop() ?? '';
        const body = Buffer.concat(chunks).toString('utf-8');
        const payload: unknown = req.headers['content-type']?.startsWith('application/json')
          ? JSON.parse(body)
          : {};
        this.calls.push({ method, payload });

        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify(this.answer(method)));
      });
    });
  }

  private answer(method: string) {
    if (this.failing.has(method)) {
      return { ok: false, error_code: 400, description: 'Bad Request: message can not be edited' };
    }
    if (['sendMessage', 'editMessageText', 'sendDocument'].includes(method)) {
      return {
        ok: true,
        result: { message_id: this.nextMessageId++, date: 1, chat, text: '' },
      };
    }
    return { ok: true, result: true };
  }

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('fake API is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      this.server.close((error) => (error ? reject(error) : resolve()))
    );
  }

  methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  last(method: string): unknown {
    return this.calls.filter((call) => call.method === method).pop()?.payload;
  }
}

let updateId = 1;

function callback(data: string): Update {
  return {
    update_id: updateId++,
    callback_query: {
      id: `query-${updateId}`,
      from: user,
      chat_instance: 'chat-instance',
      data,
      message: { message_id: 10, date: 1, chat, text: 'menu' },
    },
  };
}

function command(name: string): Update {
  const body = `/${name}`;
  return {
    update_id: updateId++,
    message: {
      message_id: updateId,
      date: 1,
      chat,
      from: user,
      text: body,
      entities: [{ type: 'bot_command', offset: 0, length: body.length }],
    },
  };
}

describe('createBot', () => {
  let api: FakeBotApi;
  let apiRoot: string;
  let agent: Agent;

  beforeAll(() => {
    logger.setQuiet(true);
  });

  beforeEach(async () => {
    api = new FakeBotApi();
    apiRoot = await api.start();
    agent = new Agent();
  });

  afterEach(async () => {
    agent.destroy();
    await api.stop();
  });

  /**
   * A finished scan ends with the main menu
   */
  async function delivered(): Promise<void> {
    await vi.waitFor(() => expect(api.last('sendMessage')).toMatchObject({ text: text.WELCOME }));
  }

  function setup(resolver: HostResolver) {
    const verifier = new Verifier({
      createResolver: () => resolver,
      createProbe: () => ({ isAlive: async () => false, close: async () => {} }),
    });
    const { bot, sessions } = createBot({
      token: 'test-token',
      verifier,
      telegram: { apiRoot, agent },
    });
    bot.botInfo = {
      id: 1,
      is_bot: true,
      first_name: 'Scanner',
      username: 'scanner_test_bot',
      can_join_groups: false,
      can_read_all_group_messages: false,
      supports_inline_queries: false,
    };

    sessions.apply(USER_ID, { type: 'begin' });
    sessions.apply(USER_ID, { type: 'domain', text: 'example.com' });
    sessions.apply(USER_ID, { type: 'mode', mode: 'normal' });

    return { bot, sessions };
  }

  it('should publish the command menu', async () => {
    const { bot } = setup({ resolves: async () => false, cancel: () => {} });

    await registerCommands(bot.telegram);

    expect(api.last('setMyCommands')).toEqual({ commands: BOT_COMMANDS });
  });

  it('should run and deliver the scan even when message edits fail', async () => {
    const { bot, sessions } = setup({
      resolves: async (hostname) => hostname === 'api.example.com',
      cancel: () => {},
    });
    api.failing.add('editMessageText');

    await bot.handleUpdate(callback('confirm'));
    await delivered();
    expect(sessions.get(USER_ID)).toBeNull();

    expect(api.methods()).toEqual([
      'answerCallbackQuery',
      'editMessageText',
      'sendMessage',
      'editMessageText',
      'sendMessage',
      'sendDocument',
      'sendMessage',
    ]);
    expect(api.last('sendMessage')).toMatchObject({ chat_id: USER_ID });

    await bot.handleUpdate(command('start'));

    expect(api.calls).toHaveLength(8);
    expect(api.calls[7]).toMatchObject({ method: 'sendMessage', payload: { text: text.WELCOME } });
  });

  it('should show the confirmed settings and the results', async () => {
    const { bot, sessions } = setup({
      resolves: async (hostname) => hostname === 'api.example.com',
      cancel: () => {},
    });

    await bot.handleUpdate(callback('confirm'));
    await delivered();
    expect(sessions.get(USER_ID)).toBeNull();

    const edits = api.calls.filter((call) => call.method === 'editMessageText');
    expect(edits[0]?.payload).toMatchObject({
      text: text.confirmation(parseDomain('example.com'), 'normal'),
    });
    expect(edits[1]?.payload).toMatchObject({
      text: expect.stringMatching(/^✅ Scan finished: example\.com/),
    });

    const messages = api.calls.filter((call) => call.method === 'sendMessage');
    expect(messages[1]?.payload).toMatchObject({
      text: expect.stringContaining('DNS only:\n  api.example.com'),
    });
  });

  it('should stop a running scan on /cancel and deliver partial results', async () => {
    const pending: Array<(resolved: boolean) => void> = [];
    const { bot, sessions } = setup({
      resolves: () => new Promise<boolean>((resolve) => pending.push(resolve)),
      cancel: () => {
        for (const resolve of pending.splice(0)) {
          resolve(false);
        }
      },
    });

    await bot.handleUpdate(callback('confirm'));
    await vi.waitFor(() => expect(pending.length).toBeGreaterThan(0));
    expect(sessions.get(USER_ID)?.step).toBe('scanning');

    await bot.handleUpdate(command('cancel'));
    await delivered();
    expect(sessions.get(USER_ID)).toBeNull();

    const texts = api.calls
      .filter((call) => call.method === 'sendMessage' || call.method === 'editMessageText')
      .map((call) => call.payload);
    expect(texts).toContainEqual(expect.objectContaining({ text: text.CANCELLING }));
    expect(texts).toContainEqual(
      expect.objectContaining({ text: expect.stringMatching(/^🛑 Scan stopped: example\.com/) })
    );
    expect(api.methods()).toContain('sendDocument');
  });

  it('should answer busy while a scan runs', async () => {
    const pending: Array<(resolved: boolean) => void> = [];
    const { bot, sessions } = setup({
      resolves: () => new Promise<boolean>((resolve) => pending.push(resolve)),
      cancel: () => {
        for (const resolve of pending.splice(0)) {
          resolve(false);
        }
      },
    });

    await bot.handleUpdate(callback('confirm'));
    await vi.waitFor(() => expect(pending.length).toBeGreaterThan(0));
    await bot.handleUpdate(command('start'));

    expect(api.last('sendMessage')).toMatchObject({ text: text.BUSY });

    await bot.handleUpdate(command('cancel'));
    await delivered();
    expect(sessions.get(USER_ID)).toBeNull();
  });
});
