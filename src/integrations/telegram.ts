import * as core from '@actions/core';
import { errorMessage } from '../lib/errors.js';
import { fetchText } from '../lib/http.js';

export type TelegramOptions = {
  chatId?: string;
  token?: string;
};

/** Sends a message through the Bot API; returns false (with a warning) when it could not. */
export async function sendTelegram(message: string, opts: TelegramOptions = {}): Promise<boolean> {
  const token = opts.token ?? process.env.TELEGRAM_BOT_TOKEN;
  if (!token) {
    core.warning('TELEGRAM_BOT_TOKEN not set, skipping notification');
    return false;
  }

  const chatId = opts.chatId || process.env.TELEGRAM_CHAT_ID;
  if (!chatId) {
    core.warning('No Telegram chat id configured, skipping notification');
    return false;
  }

  try {
    await fetchText({
      label: 'Telegram',
      url: `https://api.telegram.org/bot${token}/sendMessage`,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text: message, disable_web_page_preview: true }),
      timeoutMs: 10_000,
      maxRetries: 1,
    });
    return true;
  } catch (err) {
    core.warning(`Telegram notification failed: ${errorMessage(err)}`);
    return false;
  }
}
