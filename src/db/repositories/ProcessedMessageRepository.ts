import type {ProcessedMessageRecord} from '../../types/events.js';
import {
  ProcessedMessageDocument,
  parseProcessedMessageDocument,
} from '../models/ProcessedMessage.js';
import {BaseRepository, IndexDefinition} from './BaseRepository.js';

/**
 * Repository for the `processed_messages` collection.
 */
export class ProcessedMessageRepository extends BaseRepository<ProcessedMessageDocument> {
  private static instance: ProcessedMessageRepository;

  protected readonly indexes: IndexDefinition[] = [
    {spec: {messageId: 1}, options: {unique: true}},
    {spec: {processedAt: 1}},
  ];

  private constructor() {
    super('processed_messages');
  }

  public static getInstance(): ProcessedMessageRepository {
    if (!ProcessedMessageRepository.instance) {
      ProcessedMessageRepository.instance = new ProcessedMessageRepository();
    }
    return ProcessedMessageRepository.instance;
  }

  /**
   * Loads and validates the record for a message.
   * @throws ProcessedMessageIntegrityError for a malformed document
   */
  async findByMessageId(messageId: string): Promise<ProcessedMessageRecord | null> {
    const collection = await this.getCollection();
    const doc = await collection.findOne(
      {messageId},
      {projection: {_id: 0}},
    );
    return doc ? parseProcessedMessageDocument(messageId, doc) : null;
  }

  async upsert(record: ProcessedMessageRecord): Promise<void> {
    const collection = await this.getCollection();
    await collection.updateOne(
      {messageId: record.messageId},
      {
        $set: {
          threadId: record.threadId,
          processedAt: record.processedAt,
          candidateIdentityKeys: [...new Set(record.candidateIdentityKeys)],
        },
      },
      {upsert: true},
    );
  }

  async deleteProcessedBefore(before: Date): Promise<number> {
    const collection = await this.getCollection();
    const result = await collection.deleteMany({processedAt: {$lt: before}});
    return result.deletedCount;
  }
}
