import { truncateChars } from '../../utils/text';
import type { UnreadEmail } from './types';

const PREVIEW_LIMIT = 100;

export const NO_UNREAD_EMAILS = '📧 No unread emails found!';

function preview(body: string): string {
  return truncateChars(body, PREVIEW_LIMIT);
}

/**
 * Plain-text summary for Telegram. Markdown control characters are removed
 * so the message renders the same with or without a parse mode.
 */
export function createTelegramSafeSummary(emails: UnreadEmail[]): string {
  if (emails.length === 0) {
    return NO_UNREAD_EMAILS;
  }

  let summary = `📧 EMAIL SUMMARY (${emails.length} unread emails)\n\n`;

  emails.forEach((email, index) => {
    const subject = email.subject.replace(/[*_[\]]/g, '');
    const sender = email.sender.replace(/[*_<>]/g, '');
    const bodyPreview = preview(email.body).replace(/[*_[\]]/g, '');

    summary += `${index + 1}. ${subject}\n`;
    summary += `From: ${sender}\n`;
    summary += `Date: ${email.date}\n`;
    summary += `Preview: ${bodyPreview}\n`;
    summary += `${'-'.repeat(40)}\n\n`;
  });

  return summary;
}

// Markdown variant for agent replies
export function createEmailSummary(emails: UnreadEmail[]): string {
  if (emails.length === 0) {
    return NO_UNREAD_EMAILS;
  }

  let summary = `📧 **Email Summary** (${emails.length} unread emails)\n\n`;

  emails.forEach((email, index) => {
    summary += `**${index + 1}. ${email.subject}**\n`;
    summary += `From: ${email.sender}\n`;
    summary += `Date: ${email.date}\n`;
    summary += `Preview: ${preview(email.body)}\n`;
    summary += `${'─'.repeat(40)}\n\n`;
  });

  return summary;
}
