import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { checkAndSendEmailSummary } from './index';
import { FALLBACK_NOTICE, sendToTelegram } from './telegram';
import type { GmailMessagesApi } from './gmail';

const CREDENTIALS = { botToken: 'test-token', chatId: '42' };
const SEND_URL = 'https://api.telegram.org/bottest-token/sendMessage';

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function sentBody(text: string) {
  return expect.objectContaining({
    method: 'POST',
    body: JSON.stringify({ chat_id: '42', text }),
  });
}

describe('sendToTelegram', () => {
  it('requires a bot token and chat id', async () => {
    await expect(sendToTelegram('hello', { chatId: '42' })).resolves.toEqual({
      status: 'error',
      errorMessage: 'Telegram bot token or chat ID not configured.',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the message as plain text', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));

    await expect(sendToTelegram('hello', CREDENTIALS)).resolves.toEqual({
      status: 'success',
      message: 'Email summary sent to Telegram successfully!',
    });
    expect(fetchMock).toHaveBeenCalledWith(SEND_URL, sentBody('hello'));
  });

  it('falls back to a short notice when the summary is rejected', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('Bad Request: message is too long', { status: 400 }))
      .mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));

    await expect(sendToTelegram('a very long summary', CREDENTIALS)).resolves.toEqual({
      status: 'success',
      message: 'Simplified email notification sent to Telegram successfully!',
    });
    expect(fetchMock).toHaveBeenNthCalledWith(2, SEND_URL, sentBody(FALLBACK_NOTICE));
  });

  it('reports the first response when both sends fail', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('Bad Request: chat not found', { status: 400 }))
      .mockResolvedValueOnce(new Response('Bad Request: chat not found again', { status: 400 }));

    await expect(sendToTelegram('summary', CREDENTIALS)).resolves.toEqual({
      status: 'error',
      errorMessage: 'Failed to send to Telegram: Bad Request: chat not found',
    });
  });

  it('reports network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));

    await expect(sendToTelegram('summary', CREDENTIALS)).resolves.toEqual({
      status: 'error',
      errorMessage: 'Error sending to Telegram: ECONNRESET',
    });
  });
});

describe('checkAndSendEmailSummary', () => {
  it('returns the Gmail error without sending anything', async () => {
    await expect(
      checkAndSendEmailSummary({ messages: null, telegram: CREDENTIALS })
    ).resolves.toEqual({
      status: 'error',
      errorMessage: 'Failed to authenticate with Gmail. Please check your credentials.',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the summary and reports the Telegram status', async () => {
    const messages: GmailMessagesApi = {
      list: vi.fn(async () => ({ data: { messages: [] } })),
      get: vi.fn(async () => ({ data: {} })),
    };
    fetchMock.mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));

    await expect(
      checkAndSendEmailSummary({ messages, telegram: CREDENTIALS, maxResults: 3 })
    ).resolves.toEqual({
      status: 'success',
      message: 'Processed 0 unread emails and sent summary to Telegram.',
      emailCount: 0,
      telegramStatus: 'success',
    });
    expect(messages.list).toHaveBeenCalledWith({ userId: 'me', q: 'is:unread', maxResults: 3 });
    expect(fetchMock).toHaveBeenCalledWith(SEND_URL, sentBody('📧 No unread emails found!'));
  });
});
