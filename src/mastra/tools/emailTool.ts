import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import {
  checkAndSendEmailSummary,
  createEmailSummary,
  getUnreadEmails,
  sendToTelegram,
  unreadEmailSchema,
} from '../email';

export const emailTool = createTool({
  id: 'email-tool',
  description:
    'Read unread Gmail messages, summarize them, and send summaries or custom messages to Telegram',
  inputSchema: z.object({
    action: z.enum(['getUnreadEmails', 'createSummary', 'sendToTelegram', 'checkAndSend']),
    maxResults: z.number().int().min(1).max(50).optional().default(10),
    emails: z.array(unreadEmailSchema).optional(),
    message: z.string().optional(),
  }),
  execute: async ({ context }) => {
    const { action, maxResults, emails, message } = context;

    switch (action) {
      case 'getUnreadEmails':
        return getUnreadEmails(maxResults);

      case 'createSummary': {
        if (!emails) {
          return { status: 'error' as const, errorMessage: 'Emails are required' };
        }
        return {
          status: 'success' as const,
          summary: createEmailSummary(emails),
          emailCount: emails.length,
        };
      }

      case 'sendToTelegram': {
        if (!message) {
          return { status: 'error' as const, errorMessage: 'Message is required' };
        }
        return sendToTelegram(message);
      }

      case 'checkAndSend':
        return checkAndSendEmailSummary({ maxResults });
    }
  },
});
