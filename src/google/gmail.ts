import {Auth, gmail_v1, google} from 'googleapis';
import type {EmailMessage, EmailPage, EmailSource} from '../events/ports.js';
import {withRetry} from '../events/retry.js';
import {googleStatusOf, isTransientGoogleError} from './errors.js';

const MESSAGE_FETCH_TIMEOUT_MS = 10000;

export interface GmailSourceOptions {
  query: string;
  pageSize?: number;
  maxAttempts?: number;
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

function collectPlainText(part: gmail_v1.Schema$MessagePart | undefined): string[] {
  if (!part) return [];
  const texts: string[] = [];
  if (part.mimeType === 'text/plain' && part.body?.data && !part.filename) {
    texts.push(decodeBase64Url(part.body.data));
  }
  for (const child of part.parts ?? []) {
    texts.push(...collectPlainText(child));
  }
  return texts;
}

/**
 * Converts a Gmail API message (format=full) to an EmailMessage.
 * Returns null for messages missing an id, thread or timestamp.
 */
export function toEmailMessage(message: gmail_v1.Schema$Message): EmailMessage | null {
  if (!message.id || !message.threadId) {
    console.warn('[Gmail API] Message missing id or threadId:', {id: message.id});
    return null;
  }

  const headers: Record<string, string> = {};
  for (const header of message.payload?.headers ?? []) {
    if (header.name && typeof header.value === 'string') {
      headers[header.name.toLowerCase()] = header.value;
    }
  }

  let receivedAt = message.internalDate ? new Date(Number(message.internalDate)) : null;
  if ((!receivedAt || isNaN(receivedAt.getTime())) && headers.date) {
    receivedAt = new Date(headers.date);
  }
  if (!receivedAt || isNaN(receivedAt.getTime())) {
    console.warn(`[Gmail API] Message ${message.id} has no usable timestamp, skipping`);
    return null;
  }

  const plain = collectPlainText(message.payload ?? undefined).join('\n').trim();

  return {
    id: message.id,
    threadId: message.threadId,
    subject: headers.subject ?? '',
    bodyText: plain || message.snippet || '',
    headers,
    receivedAt,
  };
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * EmailSource over the Gmail API, one page of message ids at a time.
 */
export class GmailEmailSource implements EmailSource {
  private readonly gmail: gmail_v1.Gmail;

  constructor(
    auth: Auth.OAuth2Client,
    private readonly options: GmailSourceOptions,
  ) {
    this.gmail = google.gmail({version: 'v1', auth});
  }

  async listMessages(pageToken?: string): Promise<EmailPage> {
    const startTime = Date.now();
    console.log(
      `[Gmail API] [${new Date().toISOString()}] Listing messages`,
      {query: this.options.query, pageToken: pageToken ?? null},
    );

    const res = await withRetry(
      () =>
        this.gmail.users.messages.list({
          userId: 'me',
          q: this.options.query,
          maxResults: this.options.pageSize ?? 25,
          pageToken,
        }),
      {
        maxAttempts: this.options.maxAttempts ?? 3,
        baseDelayMs: 2000,
        maxDelayMs: 8000,
        label: 'Gmail list',
        isRetryable: isTransientGoogleError,
      },
    );

    const ids = (res.data.messages ?? [])
      .map(m => m.id)
      .filter((id): id is string => Boolean(id));

    const results = await Promise.allSettled(ids.map(id => this.fetchMessage(id)));
    const messages = results
      .filter(
        (r): r is PromiseFulfilledResult<EmailMessage | null> => r.status === 'fulfilled',
      )
      .map(r => r.value)
      .filter((m): m is EmailMessage => m !== null);

    console.log(
      `[Gmail API] [${new Date().toISOString()}] Fetched ${messages.length}/${ids.length} messages (${Date.now() - startTime}ms)`,
    );
    return {messages, nextPageToken: res.data.nextPageToken ?? undefined};
  }

  private async fetchMessage(id: string): Promise<EmailMessage | null> {
    try {
      const res = await withTimeout(
        this.gmail.users.messages.get({userId: 'me', id, format: 'full'}),
        MESSAGE_FETCH_TIMEOUT_MS,
        'Message fetch',
      );
      return toEmailMessage(res.data);
    } catch (error) {
      // left for the next poll cycle
      console.warn(`[Gmail API] Failed to fetch message ${id}:`, {
        status: googleStatusOf(error),
        errorType: error instanceof Error ? error.constructor.name : typeof error,
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
