import type {
  EventCandidate,
  Resolution,
  ResolvedCandidate,
  SyncedEvent,
} from '../types/events.js';
import type {SyncStateStore} from './store.js';

/**
 * Classifies a candidate against the stored record for its identity key.
 * A cancelled record resolves as new so the event is revived.
 */
export function classifyCandidate(
  candidate: EventCandidate,
  existing: SyncedEvent | null,
): Resolution {
  if (!existing) {
    return {type: 'new'};
  }
  if (existing.status === 'cancelled') {
    return {type: 'new', previous: existing};
  }
  return existing.lastSyncedStateHash === candidate.stateHash
    ? {type: 'unchanged_duplicate', syncedEvent: existing}
    : {type: 'updated_duplicate', syncedEvent: existing};
}

export async function resolveCandidate(
  candidate: EventCandidate,
  store: SyncStateStore,
): Promise<ResolvedCandidate> {
  const existing = await store.get(candidate.identityKey);
  return {candidate, resolution: classifyCandidate(candidate, existing)};
}

export async function resolveCandidates(
  candidates: EventCandidate[],
  store: SyncStateStore,
): Promise<ResolvedCandidate[]> {
  const resolved: ResolvedCandidate[] = [];
  for (const candidate of candidates) {
    resolved.push(await resolveCandidate(candidate, store));
  }
  return resolved;
}
