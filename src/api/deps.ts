import type {AppConfig} from '../config.js';
import type {SyncMetrics} from '../events/metrics.js';
import type {SyncStateStore} from '../events/store.js';
import type {InboxPoller, MessageHandler} from '../worker/InboxPoller.js';

/** Everything the HTTP routes need, wired once in server.ts. */
export interface ApiDeps {
  config: AppConfig;
  store: SyncStateStore;
  processor: MessageHandler;
  metrics: SyncMetrics;
  poller: InboxPoller | null;
}
