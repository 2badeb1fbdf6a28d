import { createStep, createWorkflow } from '@mastra/core/workflows';
import { z } from 'zod';
import { config } from '../../config';
import logger from '../../utils/logger';
import {
  createTelegramSafeSummary,
  getUnreadEmails,
  sendToTelegram,
  unreadEmailSchema,
} from '../email';

const triggerSchema = z.object({
  maxResults: z.number().int().min(1).max(50).default(config.gmail.maxResults),
});

const fetchedEmailsSchema = z.object({
  emails: z.array(unreadEmailSchema),
  emailCount: z.number(),
});

const summarySchema = z.object({
  summary: z.string(),
  emailCount: z.number(),
});

const runResultSchema = z.object({
  emailCount: z.number(),
  message: z.string(),
});

// Step 1: Fetch unread emails from Gmail
const fetchEmailsStep = createStep({
  id: 'fetch-unread-emails',
  description: 'Fetch unread emails from the Gmail inbox',
  inputSchema: triggerSchema,
  outputSchema: fetchedEmailsSchema,
  execute: async ({ inputData }) => {
    logger.info('[Step 1] Fetching unread emails', { maxResults: inputData.maxResults });

    const result = await getUnreadEmails(inputData.maxResults);
    if (result.status === 'error') {
      throw new Error(result.errorMessage);
    }

    logger.info(`[Step 1] Fetched ${result.emailCount} emails`);
    return { emails: result.emails, emailCount: result.emailCount };
  },
});

// Step 2: Build a Telegram-safe summary
const summarizeStep = createStep({
  id: 'summarize-emails',
  description: 'Create a plain-text summary of the unread emails',
  inputSchema: fetchedEmailsSchema,
  outputSchema: summarySchema,
  execute: async ({ inputData }) => {
    return {
      summary: createTelegramSafeSummary(inputData.emails),
      emailCount: inputData.emailCount,
    };
  },
});

// Step 3: Send the summary to Telegram
const sendSummaryStep = createStep({
  id: 'send-telegram-summary',
  description: 'Send the summary to the configured Telegram chat',
  inputSchema: summarySchema,
  outputSchema: runResultSchema,
  execute: async ({ inputData }) => {
    const result = await sendToTelegram(inputData.summary);
    if (result.status === 'error') {
      logger.error('[Step 3] Telegram delivery failed', { error: result.errorMessage });
      throw new Error(result.errorMessage);
    }

    logger.info('[Step 3] Summary delivered', { emailCount: inputData.emailCount });
    return { emailCount: inputData.emailCount, message: result.message };
  },
});

export const emailSummaryWorkflow = createWorkflow({
  id: 'email-summary-workflow',
  description: 'Read unread emails, summarize them and send the summary to Telegram',
  inputSchema: triggerSchema,
  outputSchema: runResultSchema,
})
  .then(fetchEmailsStep)
  .then(summarizeStep)
  .then(sendSummaryStep);

emailSummaryWorkflow.commit();

// Run the workflow outside of the Mastra server, e.g. from a cron job
export async function triggerEmailSummary(maxResults: number = config.gmail.maxResults) {
  logger.info('[Manual Trigger] Starting email summary workflow');

  const run = emailSummaryWorkflow.createRun();
  const result = await run.start({ inputData: { maxResults } });

  if (result.status !== 'success') {
    logger.error('[Manual Trigger] Email summary workflow did not complete', {
      status: result.status,
    });
  }
  return result;
}
