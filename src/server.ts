import cors from 'cors';
import express from 'express';
import type {Express, NextFunction, Request, Response} from 'express';
import type {Server} from 'http';
import {createLlmExtractor} from './ai/extraction.js';
import type {ApiDeps} from './api/deps.js';
import {createApiRouter} from './api/router.js';
import {type AppConfig, config, logConfig, validateConfig} from './config.js';
import {connect as connectToDatabase, disconnect} from './db/connection.js';
import {MongoSyncStateStore} from './db/MongoSyncStateStore.js';
import {InMemorySyncStateStore} from './events/InMemorySyncStateStore.js';
import {KeyedLock} from './events/keyedLock.js';
import {SyncMetrics} from './events/metrics.js';
import {MessageProcessor} from './events/processor.js';
import {SyncReconciler} from './events/reconciler.js';
import type {SyncStateStore} from './events/store.js';
import {GoogleCalendarService} from './google/calendar.js';
import {createOAuth2Client} from './google/client.js';
import {GmailEmailSource} from './google/gmail.js';
import {InboxPoller} from './worker/InboxPoller.js';

function isApiRequest(req: Request): boolean {
  return (
    req.path.startsWith('/api/') ||
    Boolean(req.get('Accept')?.includes('application/json'))
  );
}

// Type guard for error-like objects
function isErrorLike(e: unknown): e is {
  message?: string;
  code?: unknown;
  status?: number;
  statusCode?: number;
  stack?: string;
} {
  return typeof e === 'object' && e !== null;
}

/**
 * Builds the Express app around already-wired dependencies.
 */
export function createApp(deps: ApiDeps): Express {
  const app = express();
  const allowedOrigins = deps.config.allowedOrigins;
  const isDevelopment = deps.config.nodeEnv === 'development';

  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (curl, cron jobs)
        if (!origin) {
          return callback(null, true);
        }

        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          console.warn(`[CORS] Blocked request from origin: ${origin}`);
          callback(new Error('Not allowed by CORS'));
        }
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
      maxAge: 86400,
    }),
  );
  app.use(express.json({limit: '2mb'}));

  // Request logging middleware
  app.use((req, res, next) => {
    const startTime = Date.now();
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      console.log(
        `[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} (${duration}ms)`,
      );
    });

    next();
  });

  app.use('/api', createApiRouter(deps));

  // 404 handler for unknown routes
  app.use((req, res) => {
    if (isApiRequest(req)) {
      res.status(404).json({
        error: 'Not Found',
        path: req.path,
        method: req.method,
        timestamp: new Date().toISOString(),
      });
    } else {
      res.status(404).send('Not Found');
    }
  });

  // Global error handler middleware (must be last)
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const errorObj = isErrorLike(err) ? err : null;
    const errorMessage =
      errorObj?.message || (err instanceof Error ? err.message : 'Internal Server Error');
    const errorStatus = errorObj?.status || errorObj?.statusCode || 500;
    const errorDetails = {
      errorType: err instanceof Error ? err.constructor.name : typeof err,
      message: errorMessage,
      code: errorObj?.code,
      status: errorStatus,
      path: req.path,
      method: req.method,
      timestamp: new Date().toISOString(),
      stack: isDevelopment ? errorObj?.stack : undefined,
    };

    console.error(`[Server] [${new Date().toISOString()}] Unhandled error:`, errorDetails);

    if (isApiRequest(req)) {
      res.status(errorStatus).json({
        error: errorMessage,
        details: isDevelopment ? errorDetails : undefined,
        timestamp: new Date().toISOString(),
      });
    } else {
      res.status(errorStatus).send(errorMessage);
    }
  });

  return app;
}

function installProcessHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error('[Server] Unhandled Promise Rejection:', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString(),
    });
  });

  process.on('uncaughtException', (error: Error) => {
    console.error('[Server] Uncaught Exception:', {
      message: error.message,
      stack: error.stack,
      name: error.name,
      timestamp: new Date().toISOString(),
    });
    // let the process manager restart us
    process.exit(1);
  });
}

async function createStateStore(cfg: AppConfig): Promise<SyncStateStore> {
  if (cfg.stateStore === 'memory') {
    console.warn('[Server] Using in-memory state store; sync state is lost on restart');
    return new InMemorySyncStateStore();
  }
  console.log('Initializing database connection...');
  await connectToDatabase();
  console.log('Initializing database indexes...');
  const store = new MongoSyncStateStore();
  await store.initialize();
  console.log('Database indexes initialized');
  return store;
}

/**
 * Validates configuration, wires the pipeline, starts the poller and the
 * HTTP server. SIGINT and SIGTERM shut everything down in order.
 */
export async function startServer(cfg: AppConfig = config): Promise<Server> {
  try {
    validateConfig();
    logConfig(cfg);
    installProcessHandlers();

    const store = await createStateStore(cfg);
    const metrics = new SyncMetrics();
    const auth = createOAuth2Client(cfg.google);

    const reconciler = new SyncReconciler({
      store,
      calendar: new GoogleCalendarService(auth, cfg.google.calendarId),
      lock: new KeyedLock(),
      retry: {
        maxAttempts: cfg.sync.maxAttempts,
        baseDelayMs: cfg.sync.baseDelayMs,
        maxDelayMs: cfg.sync.maxDelayMs,
      },
      metrics,
    });

    const processor = new MessageProcessor({
      store,
      extractor: createLlmExtractor(cfg.extraction),
      reconciler,
      metrics,
      options: {
        candidates: {
          minConfidence: cfg.normalization.minConfidence,
          dropLowConfidenceTimes: cfg.normalization.dropLowConfidenceTimes,
          defaultDurationMinutes: cfg.normalization.defaultDurationMinutes,
          defaultTimezone: cfg.normalization.defaultTimezone,
          dateOrder: cfg.normalization.dateOrder,
        },
        deadlineMs: cfg.sync.messageDeadlineMs,
      },
    });

    const poller = new InboxPoller(
      new GmailEmailSource(auth, {query: cfg.google.gmailQuery}),
      processor,
      {
        intervalSeconds: cfg.poller.intervalSeconds,
        concurrency: cfg.poller.concurrency,
        maxPages: cfg.google.maxPages,
      },
    );

    const app = createApp({config: cfg, store, processor, metrics, poller});

    if (cfg.poller.enabled) {
      poller.start();
    } else {
      console.log('[Server] Inbox polling disabled; use POST /api/sync to run a cycle');
    }

    const server = app.listen(cfg.port, () => {
      console.log(`Server listening on port ${cfg.port}`);
      console.log(`Health check: http://localhost:${cfg.port}/api/health`);
    });

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`[Server] ${signal} received, shutting down`);
      try {
        await poller.stop();
        await new Promise<void>((resolve, reject) =>
          server.close(error => (error ? reject(error) : resolve())),
        );
        if (cfg.stateStore === 'mongodb') {
          await disconnect();
        }
        console.log('[Server] Shutdown complete');
      } catch (error) {
        console.error('[Server] Error during shutdown:', error);
        process.exitCode = 1;
      }
    };
    process.once('SIGINT', signal => void shutdown(signal));
    process.once('SIGTERM', signal => void shutdown(signal));

    return server;
  } catch (error) {
    console.error('Failed to start server:', error);
    throw error;
  }
}
