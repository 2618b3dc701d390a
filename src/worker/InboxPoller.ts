import {DeadlineExceededError, describeError} from '../events/errors.js';
import type {EmailMessage, EmailSource} from '../events/ports.js';
import type {ProcessingResult} from '../types/events.js';

export interface PollCycleSummary {
  startedAt: string;
  durationMs: number;
  fetched: number;
  processed: number;
  alreadyProcessed: number;
  aborted: number;
  errors: number;
  created: number;
  updated: number;
  cancelled: number;
  failed: number;
}

export interface InboxPollerOptions {
  intervalSeconds: number;
  concurrency: number;
  maxPages: number;
}

export interface MessageHandler {
  processMessage(message: EmailMessage): Promise<ProcessingResult>;
}

export interface PollerStatus {
  running: boolean;
  cycleInProgress: boolean;
  lastCycle: PollCycleSummary | null;
  lastError: string | null;
}

/** Messages grouped by thread, each thread oldest first. */
export function groupByThread(messages: EmailMessage[]): EmailMessage[][] {
  const threads = new Map<string, Map<string, EmailMessage>>();
  for (const message of messages) {
    const thread = threads.get(message.threadId) ?? new Map<string, EmailMessage>();
    thread.set(message.id, message);
    threads.set(message.threadId, thread);
  }
  return [...threads.values()].map(thread =>
    [...thread.values()].sort(
      (a, b) => a.receivedAt.getTime() - b.receivedAt.getTime(),
    ),
  );
}

/**
 * Periodically pulls the mailbox and feeds messages to the processor.
 * Threads run concurrently up to `concurrency`; messages of one thread run
 * in order. A cycle that is still running when the next one is due makes
 * that one a no-op.
 */
export class InboxPoller {
  private timer: NodeJS.Timeout | null = null;
  private currentCycle: Promise<PollCycleSummary> | null = null;
  private lastCycle: PollCycleSummary | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly source: EmailSource,
    private readonly handler: MessageHandler,
    private readonly options: InboxPollerOptions,
  ) {}

  get status(): PollerStatus {
    return {
      running: this.timer !== null,
      cycleInProgress: this.currentCycle !== null,
      lastCycle: this.lastCycle,
      lastError: this.lastError,
    };
  }

  /**
   * Runs one cycle. Returns null when a cycle is already in progress.
   */
  async runOnce(): Promise<PollCycleSummary | null> {
    if (this.currentCycle) {
      console.log('[Inbox Poller] Previous cycle still running, skipping');
      return null;
    }
    this.currentCycle = this.cycle();
    try {
      const summary = await this.currentCycle;
      this.lastCycle = summary;
      this.lastError = null;
      return summary;
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      throw error;
    } finally {
      this.currentCycle = null;
    }
  }

  start(): void {
    if (this.timer) return;
    console.log(
      `[Inbox Poller] Starting, every ${this.options.intervalSeconds}s with concurrency ${this.options.concurrency}`,
    );
    this.timer = setInterval(() => void this.tick(), this.options.intervalSeconds * 1000);
    void this.tick();
  }

  /** Stops scheduling and waits for a running cycle to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[Inbox Poller] Stopped');
    }
    if (this.currentCycle) {
      await this.currentCycle.catch(() => undefined);
    }
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      console.error(
        `[Inbox Poller] [${new Date().toISOString()}] Poll cycle failed:`,
        describeError(error),
      );
    }
  }

  private async fetchAll(): Promise<EmailMessage[]> {
    const messages: EmailMessage[] = [];
    let pageToken: string | undefined;
    for (let page = 0; page < this.options.maxPages; page++) {
      const result = await this.source.listMessages(pageToken);
      messages.push(...result.messages);
      if (!result.nextPageToken) break;
      pageToken = result.nextPageToken;
    }
    return messages;
  }

  private async cycle(): Promise<PollCycleSummary> {
    const started = new Date();
    const summary: PollCycleSummary = {
      startedAt: started.toISOString(),
      durationMs: 0,
      fetched: 0,
      processed: 0,
      alreadyProcessed: 0,
      aborted: 0,
      errors: 0,
      created: 0,
      updated: 0,
      cancelled: 0,
      failed: 0,
    };

    const messages = await this.fetchAll();
    summary.fetched = messages.length;
    const queue = groupByThread(messages);

    const worker = async () => {
      for (let thread = queue.shift(); thread; thread = queue.shift()) {
        for (const message of thread) {
          await this.handle(message, summary);
        }
      }
    };
    const workers = Array.from(
      {length: Math.max(1, Math.min(this.options.concurrency, queue.length))},
      () => worker(),
    );
    await Promise.all(workers);

    summary.durationMs = Date.now() - started.getTime();
    console.log(`[Inbox Poller] [${new Date().toISOString()}] Cycle complete`, summary);
    return summary;
  }

  private async handle(message: EmailMessage, summary: PollCycleSummary): Promise<void> {
    try {
      const result = await this.handler.processMessage(message);
      if (result.alreadyProcessed) {
        summary.alreadyProcessed++;
        return;
      }
      summary.processed++;
      summary.created += result.created;
      summary.updated += result.updated;
      summary.cancelled += result.cancelled;
      summary.failed += result.failed;
    } catch (error) {
      // the message stays unprocessed and is picked up next cycle
      if (error instanceof DeadlineExceededError) {
        summary.aborted++;
      } else {
        summary.errors++;
      }
      console.error(
        `[Inbox Poller] Message ${message.id} in thread ${message.threadId} failed:`,
        describeError(error),
      );
    }
  }
}
