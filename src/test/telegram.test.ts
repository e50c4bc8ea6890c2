import * as assert from 'assert';
import { sendTelegram } from '../integrations/telegram.js';
import { jsonBody, jsonResponse, stubFetch, textResponse } from './fetch-stub.js';

suite('Telegram notifications', () => {
  let restore: (() => void) | undefined;
  let savedToken: string | undefined;
  let savedChat: string | undefined;

  setup(() => {
    savedToken = process.env.TELEGRAM_BOT_TOKEN;
    savedChat = process.env.TELEGRAM_CHAT_ID;
    delete process.env.TELEGRAM_BOT_TOKEN;
    delete process.env.TELEGRAM_CHAT_ID;
  });

  teardown(() => {
    restore?.();
    restore = undefined;
    if (savedToken !== undefined) process.env.TELEGRAM_BOT_TOKEN = savedToken;
    if (savedChat !== undefined) process.env.TELEGRAM_CHAT_ID = savedChat;
  });

  test('skips without a bot token or chat id', async () => {
    assert.strictEqual(await sendTelegram('hello', { chatId: '42' }), false);
    assert.strictEqual(await sendTelegram('hello', { token: 'test-secret' }), false);
  });

  test('posts the message to the bot API', async () => {
    const stub = stubFetch(() => jsonResponse({ ok: true }));
    restore = stub.restore;

    assert.strictEqual(await sendTelegram('hello', { token: 'test-secret', chatId: '42' }), true);
    assert.strictEqual(stub.requests[0].url, 'https://api.telegram.org/bottest-secret/sendMessage');
    assert.deepStrictEqual(jsonBody(stub.requests[0]), { chat_id: '42', text: 'hello', disable_web_page_preview: true });
  });

  test('a rejected message is reported, not thrown', async () => {
    const stub = stubFetch(() => textResponse('chat not found', 400));
    restore = stub.restore;

    assert.strictEqual(await sendTelegram('hello', { token: 'test-secret', chatId: '42' }), false);
  });
});
