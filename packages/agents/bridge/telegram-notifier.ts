// Telegram delivery for analysis and portfolio messages. Best-effort:
// send() resolves false on any failure and never rejects.

import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Telegram');

const DEFAULT_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface TelegramConfig {
  botToken: string | null;
  chatId: string | null;
  baseUrl?: string;
  timeoutMs?: number;
}

export class TelegramNotifier {
  private readonly botToken: string | null;
  private readonly chatId: string | null;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: TelegramConfig) {
    this.botToken = config.botToken;
    this.chatId = config.chatId;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get isConfigured(): boolean {
    return Boolean(this.botToken && this.chatId);
  }

  /** Send as HTML; a 400 (usually a markup rejection) is retried once as plain text. */
  async send(text: string): Promise<boolean> {
    if (!this.isConfigured) {
      log.warn('Telegram not configured; set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID');
      return false;
    }

    try {
      const first = await this.post({ chat_id: this.chatId, text, parse_mode: 'HTML', disable_web_page_preview: true });
      if (first.ok) return true;

      if (first.status === 400) {
        log.warn('Telegram rejected HTML markup; retrying as plain text');
        const retry = await this.post({ chat_id: this.chatId, text, disable_web_page_preview: true });
        if (retry.ok) return true;
        log.error('Telegram send failed', { status: retry.status });
        return false;
      }

      log.error('Telegram send failed', { status: first.status });
      return false;
    } catch (err) {
      log.error('Telegram send failed', { error: errorMessage(err) });
      return false;
    }
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await fetch(`${this.baseUrl}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
