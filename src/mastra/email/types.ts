import { z } from 'zod';

export const unreadEmailSchema = z.object({
  id: z.string(),
  sender: z.string(),
  subject: z.string(),
  date: z.string(),
  body: z.string(),
});

export type UnreadEmail = z.infer<typeof unreadEmailSchema>;

export type UnreadEmailsResult =
  | { status: 'success'; emailCount: number; emails: UnreadEmail[]; message?: string }
  | { status: 'error'; errorMessage: string };

export type TelegramSendResult =
  | { status: 'success'; message: string }
  | { status: 'error'; errorMessage: string };

export type EmailSummaryRunResult =
  | {
      status: 'success';
      message: string;
      emailCount: number;
      telegramStatus: TelegramSendResult['status'];
    }
  | { status: 'error'; errorMessage: string };
