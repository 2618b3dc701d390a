import {
  ConcurrentModificationError,
  PermanentSyncError,
  TransientSyncError,
} from '../errors.js';
import {InMemorySyncStateStore} from '../InMemorySyncStateStore.js';
import {KeyedLock} from '../keyedLock.js';
import {SyncMetrics} from '../metrics.js';
import {
  SyncReconciler,
  idempotencyKeyFor,
  planOperations,
  rederiveOperation,
} from '../reconciler.js';
import {resolveCandidates} from '../resolver.js';
import type {EventCandidate, SyncedEvent, SyncedEventInput} from '../../types/events.js';
import {FakeCalendar, RECEIVED_AT, candidateFor, noDelayRetry} from './fixtures.js';

function setup(store = new InMemorySyncStateStore()) {
  const calendar = new FakeCalendar();
  const metrics = new SyncMetrics();
  const reconciler = new SyncReconciler({
    store,
    calendar,
    lock: new KeyedLock(),
    retry: noDelayRetry,
    metrics,
    now: () => RECEIVED_AT,
  });

  const sync = async (candidates: EventCandidate[], threadId = 'thread-a', incomplete = false) => {
    const resolved = await resolveCandidates(candidates, store);
    const active = await store.listActiveForThread(threadId);
    const plan = planOperations(resolved, active, {threadId, suppressCancellation: incomplete});
    return {plan, summary: await reconciler.execute(plan.operations)};
  };

  return {store, calendar, metrics, reconciler, sync};
}

describe('SyncReconciler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('creates', () => {
    it('should create new events and record them', async () => {
      const {store, calendar, sync} = setup();
      const lunch = candidateFor();

      const {summary} = await sync([lunch]);

      expect(summary.created).toBe(1);
      expect(calendar.callsOf('create')).toEqual([lunch.identityKey]);
      const record = await store.get(lunch.identityKey);
      expect(record).toMatchObject({
        externalEventId: lunch.identityKey,
        lastSyncedStateHash: lunch.stateHash,
        status: 'active',
        sourceThreadId: 'thread-a',
        sourceMessageId: 'msg-1',
        version: 1,
      });
    });

    it('should do nothing on a second pass with the same content', async () => {
      const {calendar, sync} = setup();
      const lunch = candidateFor();
      await sync([lunch]);

      const {summary} = await sync([lunch]);

      expect(summary).toMatchObject({created: 0, updated: 0, unchanged: 1, cancelled: 0});
      expect(calendar.calls).toHaveLength(1);
    });

    it('should report only the failed write when one of three fails', async () => {
      const {store, calendar, sync} = setup();
      const a = candidateFor({title: 'Alpha'});
      const b = candidateFor({title: 'Bravo'});
      const c = candidateFor({title: 'Charlie'});
      calendar.failWith = (op, title) =>
        op === 'create' && title === 'Bravo'
          ? new PermanentSyncError('Invalid event', 400)
          : undefined;

      const {summary} = await sync([a, b, c]);

      expect(summary.created).toBe(2);
      expect(summary.failures).toEqual([
        {
          identityKey: b.identityKey,
          operation: 'create',
          kind: 'permanent',
          message: 'Invalid event',
          attempts: 1,
        },
      ]);
      expect(await store.get(a.identityKey)).not.toBeNull();
      expect(await store.get(b.identityKey)).toBeNull();
      expect(await store.get(c.identityKey)).not.toBeNull();
    });

    it('should retry transient failures until attempts run out', async () => {
      const {store, calendar, metrics, sync} = setup();
      const lunch = candidateFor();
      calendar.failWith = () => new TransientSyncError('Backend error', 503);

      const {summary} = await sync([lunch]);

      expect(calendar.callsOf('create')).toHaveLength(3);
      expect(summary.failures).toEqual([
        expect.objectContaining({kind: 'transient_exhausted', attempts: 3}),
      ]);
      expect(await store.get(lunch.identityKey)).toBeNull();
      expect(metrics.snapshot().failuresByKind.transient_exhausted).toBe(1);
    });

    it('should succeed after a transient failure', async () => {
      const {calendar, sync} = setup();
      let failures = 1;
      calendar.failWith = () => (failures-- > 0 ? new TransientSyncError('timeout') : undefined);

      const {summary} = await sync([candidateFor()]);

      expect(summary.created).toBe(1);
      expect(summary.failures).toEqual([]);
      expect(calendar.callsOf('create')).toHaveLength(2);
    });
  });

  describe('updates', () => {
    it('should issue exactly one update when only the location changes', async () => {
      const {store, calendar, sync} = setup();
      const original = candidateFor();
      await sync([original]);
      const moved = candidateFor({location: 'Rooftop'}, {messageId: 'msg-2'});
      expect(moved.identityKey).toBe(original.identityKey);

      const {summary} = await sync([moved]);

      expect(summary).toMatchObject({created: 0, updated: 1, unchanged: 0, cancelled: 0});
      expect(calendar.callsOf('update')).toEqual([original.identityKey]);
      expect(calendar.events.get(original.identityKey)?.location).toBe('Rooftop');
      expect(await store.get(original.identityKey)).toMatchObject({
        lastSyncedStateHash: moved.stateHash,
        sourceMessageId: 'msg-2',
        sourceThreadId: 'thread-a',
        version: 2,
      });
    });
  });

  describe('cancellation', () => {
    it('should cancel events of the same thread missing from the batch', async () => {
      const {store, calendar, sync} = setup();
      const lunch = candidateFor();
      const dinner = candidateFor({title: 'Dinner', dateText: 'tomorrow at 7pm'});
      await sync([lunch, dinner]);

      const {summary} = await sync([lunch]);

      expect(summary.cancelled).toBe(1);
      expect(calendar.callsOf('cancel')).toEqual([dinner.identityKey]);
      expect(await store.get(dinner.identityKey)).toMatchObject({status: 'cancelled', version: 2});
    });

    it('should never cancel events of another thread', async () => {
      const {store, calendar, sync} = setup();
      const lunch = candidateFor();
      await sync([lunch], 'thread-a');
      const review = candidateFor({title: 'Review'}, {threadId: 'thread-b'});

      const {summary} = await sync([review], 'thread-b');

      expect(summary).toMatchObject({created: 1, cancelled: 0});
      expect(calendar.callsOf('cancel')).toEqual([]);
      expect(await store.get(lunch.identityKey)).toMatchObject({status: 'active'});
    });

    it('should not cancel anything for an empty batch', async () => {
      const {sync} = setup();
      await sync([candidateFor()]);

      const {plan} = await sync([]);

      expect(plan.operations).toEqual([]);
    });

    it('should not cancel when an extraction in the message was unreadable', async () => {
      const {sync} = setup();
      await sync([candidateFor()]);

      const {plan} = await sync([candidateFor({title: 'Dinner'})], 'thread-a', true);

      expect(plan.operations.map(op => op.type)).toEqual(['create']);
    });

    it('should skip a planned cancel once the record has moved on', async () => {
      const {store, calendar, reconciler, sync} = setup();
      const lunch = candidateFor();
      await sync([lunch]);
      const planned = await store.get(lunch.identityKey);
      if (!planned) throw new Error('record missing');
      await store.put({...planned, sourceMessageId: 'msg-9'}, planned.version);

      const summary = await reconciler.execute([{type: 'cancel', syncedEvent: planned}]);

      expect(summary.cancelled).toBe(0);
      expect(calendar.callsOf('cancel')).toEqual([]);
    });

    it('should revive a cancelled event under a fresh idempotency key', async () => {
      const {store, calendar, sync} = setup();
      const lunch = candidateFor();
      const dinner = candidateFor({title: 'Dinner', dateText: 'tomorrow at 7pm'});
      await sync([lunch, dinner]);
      await sync([lunch]);

      const {summary} = await sync([lunch, dinner]);

      expect(summary.created).toBe(1);
      expect(calendar.callsOf('create')).toEqual([
        lunch.identityKey,
        dinner.identityKey,
        `${dinner.identityKey}r2`,
      ]);
      expect(await store.get(dinner.identityKey)).toMatchObject({
        status: 'active',
        externalEventId: `${dinner.identityKey}r2`,
        version: 3,
      });
    });
  });

  describe('batches', () => {
    it('should collapse candidates sharing a key to the most confident one', () => {
      const low = candidateFor({confidence: 0.6, title: 'Team Lunch!'});
      const high = candidateFor({confidence: 0.9});
      expect(low.identityKey).toBe(high.identityKey);

      const plan = planOperations(
        [
          {candidate: low, resolution: {type: 'new'}},
          {candidate: high, resolution: {type: 'new'}},
        ],
        [],
        {threadId: 'thread-a', suppressCancellation: false},
      );

      expect(plan.operations).toEqual([{type: 'create', candidate: high, previous: undefined}]);
      expect(plan.skips).toEqual([
        {title: 'Team Lunch!', reason: 'duplicate_in_batch', message: 'Same event as "Team lunch"'},
      ]);
    });
  });

  describe('concurrent modification', () => {
    class RacingStore extends InMemorySyncStateStore {
      raced = false;

      async put(event: SyncedEventInput, expectedVersion: number | null): Promise<SyncedEvent> {
        if (!this.raced && expectedVersion === null) {
          this.raced = true;
          await super.put({...event, externalEventId: 'other-worker-event'}, null);
        }
        return super.put(event, expectedVersion);
      }
    }

    /** Every first-version write loses to a record that is never visible. */
    class AlwaysLosingStore extends InMemorySyncStateStore {
      async put(event: SyncedEventInput, expectedVersion: number | null): Promise<SyncedEvent> {
        if (expectedVersion === null) {
          throw new ConcurrentModificationError(event.identityKey, null);
        }
        return super.put(event, expectedVersion);
      }
    }

    it('should report a failure when the second pass conflicts again', async () => {
      const store = new AlwaysLosingStore();
      const {calendar, metrics, sync} = setup(store);
      const lunch = candidateFor();

      const {summary} = await sync([lunch]);

      expect(summary.created).toBe(0);
      expect(summary.failures).toEqual([
        {
          identityKey: lunch.identityKey,
          operation: 'create',
          kind: 'concurrent_modification',
          message: `Synced event ${lunch.identityKey} changed concurrently (expected version none)`,
          attempts: 2,
        },
      ]);
      expect(calendar.callsOf('create')).toEqual([lunch.identityKey, lunch.identityKey]);
      expect(calendar.callsOf('cancel')).toEqual([lunch.identityKey, lunch.identityKey]);
      expect(calendar.events.size).toBe(0);
      expect(await store.get(lunch.identityKey)).toBeNull();
      expect(metrics.snapshot().failuresByKind.concurrent_modification).toBe(1);
    });

    it('should cancel its orphaned event and settle on the winner', async () => {
      const store = new RacingStore();
      const {calendar, sync} = setup(store);
      const lunch = candidateFor();

      const {summary} = await sync([lunch]);

      expect(summary).toMatchObject({created: 0, unchanged: 1, failures: []});
      expect(calendar.callsOf('cancel')).toEqual([lunch.identityKey]);
      expect(await store.get(lunch.identityKey)).toMatchObject({
        externalEventId: 'other-worker-event',
        version: 1,
      });
    });
  });
});

describe('idempotencyKeyFor', () => {
  it('should use the identity key for a first create', () => {
    const lunch = candidateFor();
    expect(idempotencyKeyFor(lunch)).toBe(lunch.identityKey);
  });

  it('should suffix the previous version for a revival', () => {
    const lunch = candidateFor();
    const previous: SyncedEvent = {
      identityKey: lunch.identityKey,
      externalEventId: lunch.identityKey,
      lastSyncedStateHash: lunch.stateHash,
      lastSyncedAt: RECEIVED_AT,
      status: 'cancelled',
      sourceThreadId: 'thread-a',
      sourceMessageId: 'msg-1',
      title: 'Team lunch',
      version: 4,
    };
    expect(idempotencyKeyFor(lunch, previous)).toBe(`${lunch.identityKey}r4`);
  });
});

describe('rederiveOperation', () => {
  it('should turn a create into a noop when the record already matches', () => {
    const lunch = candidateFor();
    const fresh: SyncedEvent = {
      identityKey: lunch.identityKey,
      externalEventId: 'evt-1',
      lastSyncedStateHash: lunch.stateHash,
      lastSyncedAt: RECEIVED_AT,
      status: 'active',
      sourceThreadId: 'thread-a',
      sourceMessageId: 'msg-1',
      title: 'Team lunch',
      version: 1,
    };
    expect(rederiveOperation({type: 'create', candidate: lunch}, fresh)).toEqual({
      type: 'noop',
      syncedEvent: fresh,
      candidate: lunch,
    });
  });

  it('should drop a cancel for a missing record', () => {
    const lunch = candidateFor();
    const planned: SyncedEvent = {
      identityKey: lunch.identityKey,
      externalEventId: 'evt-1',
      lastSyncedStateHash: lunch.stateHash,
      lastSyncedAt: RECEIVED_AT,
      status: 'active',
      sourceThreadId: 'thread-a',
      sourceMessageId: 'msg-1',
      title: 'Team lunch',
      version: 1,
    };
    expect(rederiveOperation({type: 'cancel', syncedEvent: planned}, null)).toBeNull();
  });
});
