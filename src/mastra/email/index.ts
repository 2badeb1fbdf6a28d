import { config } from '../../config';
import logger from '../../utils/logger';
import { getUnreadEmails, type GmailMessagesApi } from './gmail';
import { createTelegramSafeSummary } from './summary';
import { sendToTelegram, type TelegramCredentials } from './telegram';
import type { EmailSummaryRunResult } from './types';

export interface EmailSummaryDeps {
  messages?: GmailMessagesApi | null;
  telegram?: TelegramCredentials;
  maxResults?: number;
}

/**
 * Check unread emails and post a summary to Telegram. A Gmail failure is
 * returned as-is; a Telegram failure still counts as a completed run and is
 * reported through `telegramStatus`.
 */
export async function checkAndSendEmailSummary(
  deps: EmailSummaryDeps = {}
): Promise<EmailSummaryRunResult> {
  const emailsResult = await getUnreadEmails(
    deps.maxResults ?? config.gmail.maxResults,
    deps.messages
  );
  if (emailsResult.status === 'error') {
    return emailsResult;
  }

  const summary = createTelegramSafeSummary(emailsResult.emails);
  const telegramResult = await sendToTelegram(summary, deps.telegram ?? config.telegram);

  logger.info('Email summary processed', {
    emailCount: emailsResult.emailCount,
    telegramStatus: telegramResult.status,
  });

  return {
    status: 'success',
    message: `Processed ${emailsResult.emailCount} unread emails and sent summary to Telegram.`,
    emailCount: emailsResult.emailCount,
    telegramStatus: telegramResult.status,
  };
}

export { createGmailMessagesApi, extractEmailBody, getUnreadEmails } from './gmail';
export type { GmailMessagesApi } from './gmail';
export { createEmailSummary, createTelegramSafeSummary, NO_UNREAD_EMAILS } from './summary';
export { FALLBACK_NOTICE, sendToTelegram } from './telegram';
export type { TelegramCredentials } from './telegram';
export * from './types';
