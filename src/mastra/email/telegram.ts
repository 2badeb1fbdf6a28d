import { config } from '../../config';
import logger from '../../utils/logger';
import type { TelegramSendResult } from './types';

export interface TelegramCredentials {
  botToken?: string;
  chatId?: string;
}

export const FALLBACK_NOTICE =
  '📧 You have unread emails in your inbox!\n\nCheck your email client for details.';

async function postMessage(botToken: string, chatId: string, text: string): Promise<Response> {
  return fetch(`https://api.telegram.org/bot${botToken}/sendMessage`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ chat_id: chatId, text }),
  });
}

/**
 * Send `message` as plain text. If Telegram rejects it, a short fixed
 * notice is sent instead.
 */
export async function sendToTelegram(
  message: string,
  credentials: TelegramCredentials = config.telegram
): Promise<TelegramSendResult> {
  const { botToken, chatId } = credentials;
  if (!botToken || !chatId) {
    return {
      status: 'error',
      errorMessage: 'Telegram bot token or chat ID not configured.',
    };
  }

  try {
    const response = await postMessage(botToken, chatId, message);
    if (response.ok) {
      return { status: 'success', message: 'Email summary sent to Telegram successfully!' };
    }

    logger.warn('Telegram rejected summary, sending fallback notice', { status: response.status });
    const fallback = await postMessage(botToken, chatId, FALLBACK_NOTICE);
    if (fallback.ok) {
      return {
        status: 'success',
        message: 'Simplified email notification sent to Telegram successfully!',
      };
    }

    return {
      status: 'error',
      errorMessage: `Failed to send to Telegram: ${await response.text()}`,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error('Error sending to Telegram', { error: reason });
    return {
      status: 'error',
      errorMessage: `Error sending to Telegram: ${reason}`,
    };
  }
}
