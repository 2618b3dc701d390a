import type {
  ProcessedMessageRecord,
  SyncedEvent,
  SyncedEventInput,
} from '../types/events.js';
import {ConcurrentModificationError} from './errors.js';
import type {StoreStats, SyncStateStore} from './store.js';

function copyEvent(event: SyncedEvent): SyncedEvent {
  return {...event, lastSyncedAt: new Date(event.lastSyncedAt)};
}

/**
 * Single-process store. Each method completes without yielding between
 * its read and write, which makes put a true compare-and-set.
 */
export class InMemorySyncStateStore implements SyncStateStore {
  private readonly events = new Map<string, SyncedEvent>();
  private readonly processed = new Map<string, ProcessedMessageRecord>();

  async get(identityKey: string): Promise<SyncedEvent | null> {
    const event = this.events.get(identityKey);
    return event ? copyEvent(event) : null;
  }

  async put(
    event: SyncedEventInput,
    expectedVersion: number | null,
  ): Promise<SyncedEvent> {
    const current = this.events.get(event.identityKey);
    const currentVersion = current ? current.version : null;
    if (currentVersion !== expectedVersion) {
      throw new ConcurrentModificationError(event.identityKey, expectedVersion);
    }
    const stored: SyncedEvent = {
      ...event,
      lastSyncedAt: new Date(event.lastSyncedAt),
      version: (expectedVersion ?? 0) + 1,
    };
    this.events.set(event.identityKey, stored);
    return copyEvent(stored);
  }

  async listActiveForThread(threadId: string): Promise<SyncedEvent[]> {
    return [...this.events.values()]
      .filter(event => event.sourceThreadId === threadId && event.status === 'active')
      .map(copyEvent);
  }

  async markMessageProcessed(record: ProcessedMessageRecord): Promise<void> {
    this.processed.set(record.messageId, {
      ...record,
      processedAt: new Date(record.processedAt),
      candidateIdentityKeys: [...new Set(record.candidateIdentityKeys)],
    });
  }

  async isMessageProcessed(messageId: string): Promise<boolean> {
    return this.processed.has(messageId);
  }

  async getProcessedMessage(
    messageId: string,
  ): Promise<ProcessedMessageRecord | null> {
    return this.processed.get(messageId) ?? null;
  }

  async getStats(): Promise<StoreStats> {
    let activeEvents = 0;
    let cancelledEvents = 0;
    for (const event of this.events.values()) {
      if (event.status === 'active') {
        activeEvents++;
      } else {
        cancelledEvents++;
      }
    }
    return {activeEvents, cancelledEvents, processedMessages: this.processed.size};
  }

  async pruneProcessedMessages(before: Date): Promise<number> {
    let removed = 0;
    for (const [messageId, record] of this.processed) {
      if (record.processedAt < before) {
        this.processed.delete(messageId);
        removed++;
      }
    }
    return removed;
  }
}
