import {createOpenAI} from '@ai-sdk/openai';
import {generateObject, LanguageModel} from 'ai';
import {DateTime} from 'luxon';
import {z} from 'zod';
import type {AppConfig} from '../config.js';
import type {
  EmailMessage,
  EventExtractor,
  ExtractionRequest,
} from '../events/ports.js';
import type {RawExtraction} from '../types/events.js';

const MAX_BODY_CHARS = 12000;

export const extractionSchema = z.object({
  events: z.array(
    z.object({
      title: z.string().describe('Short name of the event, e.g. "Team sync"'),
      description: z
        .string()
        .optional()
        .describe('One or two sentences about the event, if the email says more'),
      dateText: z
        .string()
        .optional()
        .describe(
          'The date and time exactly as written in the email, e.g. "next Tuesday at 3pm" or "March 5, 10:00 ET". Do not convert it.',
        ),
      recurrenceText: z
        .string()
        .optional()
        .describe('How the event repeats as written, e.g. "every other Thursday"'),
      location: z.string().optional().describe('Room, address or meeting link'),
      durationMinutes: z
        .number()
        .optional()
        .describe('Length in minutes, only if stated or implied by an end time'),
      confidence: z
        .number()
        .min(0)
        .max(1)
        .describe('How sure you are this is a real, scheduled event (0 to 1)'),
    }),
  ),
});

export type ExtractionOutput = z.infer<typeof extractionSchema>;

export function buildExtractionPrompt(message: EmailMessage, timezone: string): string {
  const received = DateTime.fromJSDate(message.receivedAt, {zone: timezone});
  const body =
    message.bodyText.length > MAX_BODY_CHARS
      ? `${message.bodyText.slice(0, MAX_BODY_CHARS)}\n[truncated]`
      : message.bodyText;
  return `Find every meeting, appointment or event that this email schedules, reschedules or confirms.
Copy date, time and recurrence phrases exactly as they appear; do not resolve them to calendar dates.
Leave out events that are only mentioned as past or hypothetical. If there are none, return an empty list.

The email was received ${received.toFormat("cccc, LLLL d, yyyy 'at' h:mm a")} (${timezone}).

From: ${message.headers.from ?? 'unknown'}
Subject: ${message.subject}

${body}`;
}

export function toRawExtractions(output: ExtractionOutput): RawExtraction[] {
  return output.events.map(event => ({
    title: event.title,
    description: event.description ?? null,
    dateText: event.dateText ?? null,
    recurrenceText: event.recurrenceText ?? null,
    location: event.location ?? null,
    durationMinutes: event.durationMinutes ?? null,
    confidence: event.confidence,
  }));
}

/**
 * Event extraction with a language model through generateObject.
 * Model errors are logged and reported as "no events".
 */
export class LlmEventExtractor implements EventExtractor {
  constructor(private readonly model: LanguageModel) {}

  async extract(
    message: EmailMessage,
    request: ExtractionRequest,
  ): Promise<RawExtraction[]> {
    const startTime = Date.now();
    try {
      const {object} = await generateObject({
        model: this.model,
        schema: extractionSchema,
        prompt: buildExtractionPrompt(message, request.timezone),
        abortSignal: request.signal,
      });
      const extractions = toRawExtractions(object);
      console.log(
        `[Extraction] [${new Date().toISOString()}] ${extractions.length} event(s) in message ${message.id} (${Date.now() - startTime}ms)`,
      );
      return extractions;
    } catch (error) {
      if (request.signal?.aborted) {
        throw error;
      }
      console.error(`[Extraction] Error extracting events from message ${message.id}:`, {
        errorType: error instanceof Error ? error.constructor.name : typeof error,
        message: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}

export function createLlmExtractor(extractionConfig: AppConfig['extraction']): LlmEventExtractor {
  const openai = createOpenAI({apiKey: extractionConfig.apiKey});
  return new LlmEventExtractor(openai(extractionConfig.model));
}
