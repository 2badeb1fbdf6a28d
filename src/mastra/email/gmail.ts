import { google, type gmail_v1 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { config } from '../../config';
import logger from '../../utils/logger';
import { truncateChars } from '../../utils/text';
import type { UnreadEmail, UnreadEmailsResult } from './types';

const BODY_LIMIT = 500;

/** The slice of the Gmail messages resource this module calls. */
export interface GmailMessagesApi {
  list(
    params: gmail_v1.Params$Resource$Users$Messages$List
  ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }>;
}

/**
 * Build a Gmail messages client from the configured OAuth2 credentials.
 * Returns null when the refresh token or client credentials are missing.
 */
export function createGmailMessagesApi(): GmailMessagesApi | null {
  const { clientId, clientSecret, redirectUri, refreshToken } = config.gmail;
  if (!clientId || !clientSecret || !refreshToken) {
    return null;
  }

  const oauth2Client = new OAuth2Client(clientId, clientSecret, redirectUri);
  oauth2Client.setCredentials({ refresh_token: refreshToken });

  return google.gmail({ version: 'v1', auth: oauth2Client }).users.messages;
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function stripHtml(html: string): string {
  return html.replace(/<[^<]+?>/g, '');
}

/**
 * Plain-text body of a message payload. Multipart messages use their first
 * text/plain or text/html part; HTML has its tags removed.
 */
export function extractEmailBody(payload: gmail_v1.Schema$MessagePart | undefined): string {
  if (!payload) return '';

  let body = '';

  if (payload.parts) {
    for (const part of payload.parts) {
      const data = part.body?.data;
      if (part.mimeType === 'text/plain' && data) {
        body = decodeBase64Url(data);
        break;
      }
      if (part.mimeType === 'text/html' && data) {
        body = stripHtml(decodeBase64Url(data));
        break;
      }
    }
  } else if (payload.mimeType === 'text/plain' && payload.body?.data) {
    body = decodeBase64Url(payload.body.data);
  }

  return body.trim();
}

function headerValue(headers: gmail_v1.Schema$MessagePartHeader[], name: string): string | undefined {
  return headers.find((h) => h.name === name)?.value ?? undefined;
}

// Fetch unread emails from the Gmail inbox
export async function getUnreadEmails(
  maxResults: number = config.gmail.maxResults,
  messages: GmailMessagesApi | null = createGmailMessagesApi()
): Promise<UnreadEmailsResult> {
  if (!messages) {
    return {
      status: 'error',
      errorMessage: 'Failed to authenticate with Gmail. Please check your credentials.',
    };
  }

  try {
    const response = await messages.list({
      userId: 'me',
      q: 'is:unread',
      maxResults,
    });

    const ids = (response.data.messages ?? [])
      .map((message) => message.id)
      .filter((id): id is string => Boolean(id));

    if (ids.length === 0) {
      return {
        status: 'success',
        message: 'No unread emails found.',
        emailCount: 0,
        emails: [],
      };
    }

    const emails: UnreadEmail[] = [];
    for (const id of ids) {
      const detail = await messages.get({ userId: 'me', id, format: 'full' });
      const payload = detail.data.payload ?? undefined;
      const headers = payload?.headers ?? [];

      emails.push({
        id,
        sender: headerValue(headers, 'From') ?? 'Unknown',
        subject: headerValue(headers, 'Subject') ?? 'No Subject',
        date: headerValue(headers, 'Date') ?? 'Unknown',
        body: truncateChars(extractEmailBody(payload), BODY_LIMIT),
      });
    }

    return {
      status: 'success',
      emailCount: emails.length,
      emails,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Error fetching emails', { error: message });
    return {
      status: 'error',
      errorMessage: `Error fetching emails: ${message}`,
    };
  }
}
