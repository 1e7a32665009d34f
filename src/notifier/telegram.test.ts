import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MockAgent } from 'undici';
import { isTelegramConfigured, MAX_MESSAGE_LENGTH, notify, type NotifyOptions } from './telegram.js';

const API = 'https://api.telegram.org';
const PATH = '/bottest-token/sendMessage';
const DESTINATION = { token: 'test-token', chatId: 'test-chat' };

describe('isTelegramConfigured', () => {
  it('needs both fields to be non-blank', () => {
    expect(isTelegramConfigured(DESTINATION)).toBe(true);
    expect(isTelegramConfigured({ token: 'test-token' })).toBe(false);
    expect(isTelegramConfigured({ token: '  ', chatId: 'test-chat' })).toBe(false);
  });
});

describe('notify', () => {
  let agent: MockAgent;
  let options: NotifyOptions;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    options = { dispatcher: agent, timeoutMs: 1000 };
  });

  afterEach(async () => {
    await agent.close();
  });

  it.each([
    { token: '', chatId: 'x' },
    { token: 'test-token', chatId: '' },
    { token: '   ', chatId: 'x' },
    {},
  ])('skips without a network call for %o', async (config) => {
    const dispatch = vi.spyOn(agent, 'dispatch');

    const outcome = await notify(config, 'summary', options);

    expect(outcome.status).toBe('skipped');
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('posts the summary as an HTML message', async () => {
    let sent = '';
    agent
      .get(API)
      .intercept({
        path: PATH,
        method: 'POST',
        body: (body) => {
          sent = body;
          return true;
        },
      })
      .reply(200, { ok: true, result: {} });

    const outcome = await notify(DESTINATION, '<b>Jobs</b>\n0 postings found', options);

    expect(outcome).toEqual({ status: 'sent' });
    const params = new URLSearchParams(sent);
    expect(params.get('chat_id')).toBe('test-chat');
    expect(params.get('text')).toBe('<b>Jobs</b>\n0 postings found');
    expect(params.get('parse_mode')).toBe('HTML');
    expect(params.get('disable_web_page_preview')).toBe('true');
  });

  it('trims the destination before sending', async () => {
    agent.get(API).intercept({ path: PATH, method: 'POST' }).reply(200, { ok: true });

    const outcome = await notify({ token: ' test-token ', chatId: ' test-chat ' }, 'summary', options);

    expect(outcome).toEqual({ status: 'sent' });
  });

  it('cuts long messages', async () => {
    let sent = '';
    agent
      .get(API)
      .intercept({
        path: PATH,
        method: 'POST',
        body: (body) => {
          sent = body;
          return true;
        },
      })
      .reply(200, { ok: true });

    await notify(DESTINATION, 'x'.repeat(5000), options);

    expect(new URLSearchParams(sent).get('text')).toHaveLength(MAX_MESSAGE_LENGTH);
  });

  it('cuts long summaries at a line boundary', async () => {
    let sent = '';
    agent
      .get(API)
      .intercept({
        path: PATH,
        method: 'POST',
        body: (body) => {
          sent = body;
          return true;
        },
      })
      .reply(200, { ok: true });
    const lines = ['<b>Jobs</b>', ...Array.from({ length: 500 }, () => 'QA Engineer &amp; Tester')];

    await notify(DESTINATION, lines.join('\n'), options);

    const text = new URLSearchParams(sent).get('text');
    expect(text).toBe(lines.slice(0, 160).join('\n'));
    expect(text).toHaveLength(3986);
  });

  it('uses a custom API base URL', async () => {
    agent.get('https://bot-proxy.example.test').intercept({ path: `/tg${PATH}`, method: 'POST' }).reply(200, {});

    const outcome = await notify(DESTINATION, 'summary', {
      ...options,
      apiBaseUrl: 'https://bot-proxy.example.test/tg/',
    });

    expect(outcome).toEqual({ status: 'sent' });
  });

  it('reports the API description and a hint on 401', async () => {
    agent
      .get(API)
      .intercept({ path: PATH, method: 'POST' })
      .reply(401, { ok: false, error_code: 401, description: 'Unauthorized' });

    const outcome = await notify(DESTINATION, 'summary', options);

    expect(outcome).toEqual({
      status: 'failed',
      reason: 'HTTP 401: Unauthorized (check TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID)',
    });
  });

  it('keeps non-JSON error bodies as they are', async () => {
    agent.get(API).intercept({ path: PATH, method: 'POST' }).reply(400, 'Bad Request: chat not found');

    const outcome = await notify(DESTINATION, 'summary', options);

    expect(outcome).toEqual({ status: 'failed', reason: 'HTTP 400: Bad Request: chat not found' });
  });

  it('turns transport errors into a failed outcome', async () => {
    agent
      .get(API)
      .intercept({ path: PATH, method: 'POST' })
      .replyWithError(new Error('socket hang up'));

    const outcome = await notify(DESTINATION, 'summary', options);

    expect(outcome).toEqual({ status: 'failed', reason: 'socket hang up' });
  });
});
