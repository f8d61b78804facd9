// Tests for TelegramNotifier with a stubbed fetch

import { afterEach, describe, it, expect, vi } from 'vitest';
import { TelegramNotifier } from '../bridge/telegram-notifier.js';

function stubFetch(...statuses: number[]) {
  const queue = [...statuses];
  const fetchMock = vi.fn(async (_url: string, _init?: { body?: unknown }) => new Response('{}', { status: queue.shift() ?? 200 }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function bodyOf(init: { body?: unknown } | undefined): unknown {
  return JSON.parse(String(init?.body));
}

const notifier = () => new TelegramNotifier({ botToken: 'test-token', chatId: '12345' });

describe('TelegramNotifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('does nothing when unconfigured', async () => {
    const fetchMock = stubFetch(200);
    const unconfigured = new TelegramNotifier({ botToken: 'test-token', chatId: null });

    expect(unconfigured.isConfigured).toBe(false);
    expect(await unconfigured.send('hello')).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends HTML to the bot endpoint', async () => {
    const fetchMock = stubFetch(200);

    expect(await notifier().send('<b>BUY</b>')).toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(bodyOf(init)).toEqual({
      chat_id: '12345',
      text: '<b>BUY</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  });

  it('retries once as plain text after a 400', async () => {
    const fetchMock = stubFetch(400, 200);

    expect(await notifier().send('<b>broken')).toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(bodyOf(fetchMock.mock.calls[1][1])).toEqual({
      chat_id: '12345',
      text: '<b>broken',
      disable_web_page_preview: true,
    });
  });

  it('returns false on other HTTP errors without retrying', async () => {
    const fetchMock = stubFetch(500);

    expect(await notifier().send('hello')).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('returns false when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('network unreachable');
    }));

    expect(await notifier().send('hello')).toBe(false);
  });

  it('uses a custom base URL', async () => {
    const fetchMock = stubFetch(200);
    const custom = new TelegramNotifier({ botToken: 'test-token', chatId: '1', baseUrl: 'http://localhost:8081' });

    await custom.send('hello');

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8081/bottest-token/sendMessage');
  });
});
