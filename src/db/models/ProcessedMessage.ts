import {ObjectId} from 'mongodb';
import {z} from 'zod';
import {ProcessedMessageIntegrityError} from '../../events/errors.js';
import type {ProcessedMessageRecord} from '../../types/events.js';

export interface ProcessedMessageDocument {
  _id?: ObjectId;
  messageId: string;
  threadId: string;
  processedAt: Date;
  candidateIdentityKeys: string[];
}

const processedMessageSchema = z.object({
  messageId: z.string().min(1),
  threadId: z.string().min(1),
  processedAt: z.date(),
  candidateIdentityKeys: z.array(z.string().regex(/^[0-9a-f]{64}$/)),
});

/**
 * Validates a stored processed-message document.
 * @throws ProcessedMessageIntegrityError when the document is malformed or
 *   belongs to another message
 */
export function parseProcessedMessageDocument(
  messageId: string,
  doc: unknown,
): ProcessedMessageRecord {
  const parsed = processedMessageSchema.safeParse(doc);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProcessedMessageIntegrityError(messageId, detail);
  }
  if (parsed.data.messageId !== messageId) {
    throw new ProcessedMessageIntegrityError(
      messageId,
      `record belongs to message ${parsed.data.messageId}`,
    );
  }
  return parsed.data;
}
