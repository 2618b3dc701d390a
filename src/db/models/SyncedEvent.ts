import {ObjectId, WithId} from 'mongodb';
import type {SyncedEvent, SyncedEventStatus} from '../../types/events.js';

/**
 * A calendar event this service created, keyed by identity key.
 * `version` increases by one on every write and guards concurrent writers.
 */
export interface SyncedEventDocument {
  _id?: ObjectId;
  identityKey: string;
  externalEventId: string;
  lastSyncedStateHash: string;
  lastSyncedAt: Date;
  status: SyncedEventStatus;
  sourceThreadId: string;
  sourceMessageId: string;
  title: string;
  version: number;
}

export function toSyncedEvent(doc: WithId<SyncedEventDocument>): SyncedEvent {
  return {
    identityKey: doc.identityKey,
    externalEventId: doc.externalEventId,
    lastSyncedStateHash: doc.lastSyncedStateHash,
    lastSyncedAt: doc.lastSyncedAt,
    status: doc.status,
    sourceThreadId: doc.sourceThreadId,
    sourceMessageId: doc.sourceMessageId,
    title: doc.title,
    version: doc.version,
  };
}
