import dotenv from 'dotenv';
import {IANAZone} from 'luxon';
import type {DateOrder} from './events/normalizer.js';

dotenv.config();

export type StateStoreKind = 'mongodb' | 'memory';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  allowedOrigins: string[];
  google: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    calendarId: string;
    gmailQuery: string;
    maxPages: number;
  };
  extraction: {
    apiKey: string;
    model: string;
  };
  normalization: {
    defaultTimezone: string;
    dateOrder?: DateOrder;
    defaultDurationMinutes: number;
    minConfidence: number;
    dropLowConfidenceTimes: boolean;
  };
  sync: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    messageDeadlineMs: number;
  };
  poller: {
    enabled: boolean;
    intervalSeconds: number;
    concurrency: number;
  };
  processedMessageRetentionDays: number;
  stateStore: StateStoreKind;
}

type Env = Record<string, string | undefined>;

const MIN_RECOMMENDED_POLL_SECONDS = 30;

function numberOf(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : Number(raw);
}

function boolOf(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function listOf(env: Env, name: string, fallback: string): string[] {
  return (env[name] || fallback)
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * Reads configuration from an environment, applying defaults. Values are
 * not checked here; see validateConfig().
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const dateOrder = env.DATE_ORDER?.trim().toUpperCase();
  return {
    port: numberOf(env, 'PORT', 3978),
    nodeEnv: env.NODE_ENV || 'development',
    allowedOrigins: listOf(env, 'ALLOWED_ORIGINS', 'http://localhost:3000'),
    google: {
      clientId: env.GOOGLE_CLIENT_ID || '',
      clientSecret: env.GOOGLE_CLIENT_SECRET || '',
      redirectUri: env.GOOGLE_REDIRECT_URI || '',
      refreshToken: env.GOOGLE_REFRESH_TOKEN || '',
      calendarId: env.GOOGLE_CALENDAR_ID || 'primary',
      gmailQuery: env.GMAIL_QUERY || 'in:inbox newer_than:7d',
      maxPages: numberOf(env, 'GMAIL_MAX_PAGES', 5),
    },
    extraction: {
      apiKey: env.AI_GATEWAY_API_KEY || '',
      model: env.EXTRACTION_MODEL || 'gpt-4o-mini',
    },
    normalization: {
      defaultTimezone: env.DEFAULT_TIMEZONE || 'America/Chicago',
      dateOrder: dateOrder === 'MDY' || dateOrder === 'DMY' ? dateOrder : undefined,
      defaultDurationMinutes: numberOf(env, 'DEFAULT_EVENT_DURATION_MINUTES', 30),
      minConfidence: numberOf(env, 'MIN_EXTRACTION_CONFIDENCE', 0.5),
      dropLowConfidenceTimes: boolOf(env, 'DROP_LOW_CONFIDENCE_TIMES', false),
    },
    sync: {
      maxAttempts: numberOf(env, 'SYNC_MAX_ATTEMPTS', 5),
      baseDelayMs: numberOf(env, 'SYNC_BASE_DELAY_MS', 500),
      maxDelayMs: numberOf(env, 'SYNC_MAX_DELAY_MS', 8000),
      messageDeadlineMs: numberOf(env, 'MESSAGE_DEADLINE_MS', 60000),
    },
    poller: {
      enabled: boolOf(env, 'POLL_ENABLED', true),
      intervalSeconds: numberOf(env, 'POLL_INTERVAL_SECONDS', 60),
      concurrency: numberOf(env, 'POLL_CONCURRENCY', 4),
    },
    processedMessageRetentionDays: numberOf(env, 'PROCESSED_MESSAGE_RETENTION_DAYS', 90),
    stateStore: env.STATE_STORE === 'memory' ? 'memory' : 'mongodb',
  };
}

/**
 * Checks every setting and returns all problems at once. Warnings are
 * settings that work but are probably not what was meant.
 */
export function checkConfig(env: Env = process.env): {
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];
  const cfg = loadConfig(env);

  const requireInt = (name: string, value: number, min: number, max = Infinity) => {
    if (!Number.isInteger(value) || value < min || value > max) {
      const range = max === Infinity ? `>= ${min}` : `${min}-${max}`;
      errors.push(`Invalid ${name}: ${env[name]} (must be an integer ${range})`);
    }
  };

  requireInt('PORT', cfg.port, 1, 65535);

  for (const origin of cfg.allowedOrigins) {
    try {
      new URL(origin);
    } catch {
      errors.push(`Invalid ALLOWED_ORIGINS entry: ${origin} (must be a valid URL)`);
    }
  }

  if (!cfg.google.clientId.trim()) {
    errors.push('GOOGLE_CLIENT_ID is required');
  } else if (!cfg.google.clientId.includes('.apps.googleusercontent.com')) {
    errors.push(
      'GOOGLE_CLIENT_ID appears to be invalid (should contain .apps.googleusercontent.com)',
    );
  }
  if (!cfg.google.clientSecret.trim()) {
    errors.push('GOOGLE_CLIENT_SECRET is required');
  }
  if (!cfg.google.refreshToken.trim()) {
    errors.push('GOOGLE_REFRESH_TOKEN is required');
  }
  if (cfg.google.redirectUri) {
    try {
      const redirectUrl = new URL(cfg.google.redirectUri);
      if (redirectUrl.protocol !== 'http:' && redirectUrl.protocol !== 'https:') {
        errors.push('GOOGLE_REDIRECT_URI must use http or https protocol');
      }
    } catch {
      errors.push(
        `Invalid GOOGLE_REDIRECT_URI: ${cfg.google.redirectUri} (must be a valid URL)`,
      );
    }
  }
  requireInt('GMAIL_MAX_PAGES', cfg.google.maxPages, 1);

  if (!cfg.extraction.apiKey) {
    errors.push('AI_GATEWAY_API_KEY is required for event extraction');
  }

  if (!IANAZone.isValidZone(cfg.normalization.defaultTimezone)) {
    errors.push(
      `Invalid DEFAULT_TIMEZONE: ${cfg.normalization.defaultTimezone} (must be an IANA zone such as America/Chicago)`,
    );
  }
  if (env.DATE_ORDER && !cfg.normalization.dateOrder) {
    errors.push(`Invalid DATE_ORDER: ${env.DATE_ORDER} (must be MDY or DMY)`);
  }
  requireInt(
    'DEFAULT_EVENT_DURATION_MINUTES',
    cfg.normalization.defaultDurationMinutes,
    1,
    24 * 60,
  );
  const minConfidence = cfg.normalization.minConfidence;
  if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
    errors.push(
      `Invalid MIN_EXTRACTION_CONFIDENCE: ${env.MIN_EXTRACTION_CONFIDENCE} (must be between 0 and 1)`,
    );
  }

  requireInt('SYNC_MAX_ATTEMPTS', cfg.sync.maxAttempts, 1, 20);
  requireInt('SYNC_BASE_DELAY_MS', cfg.sync.baseDelayMs, 0);
  requireInt('SYNC_MAX_DELAY_MS', cfg.sync.maxDelayMs, 0);
  if (cfg.sync.maxDelayMs < cfg.sync.baseDelayMs) {
    errors.push('SYNC_MAX_DELAY_MS must not be smaller than SYNC_BASE_DELAY_MS');
  }
  requireInt('MESSAGE_DEADLINE_MS', cfg.sync.messageDeadlineMs, 1000);

  requireInt('POLL_INTERVAL_SECONDS', cfg.poller.intervalSeconds, 1);
  if (cfg.poller.intervalSeconds < MIN_RECOMMENDED_POLL_SECONDS) {
    warnings.push(
      `POLL_INTERVAL_SECONDS is ${cfg.poller.intervalSeconds}; intervals under ${MIN_RECOMMENDED_POLL_SECONDS}s may hit Gmail API rate limits`,
    );
  }
  requireInt('POLL_CONCURRENCY', cfg.poller.concurrency, 1, 64);
  requireInt(
    'PROCESSED_MESSAGE_RETENTION_DAYS',
    cfg.processedMessageRetentionDays,
    1,
  );

  if (env.STATE_STORE && env.STATE_STORE !== 'mongodb' && env.STATE_STORE !== 'memory') {
    errors.push(`Invalid STATE_STORE: ${env.STATE_STORE} (must be mongodb or memory)`);
  }
  if (cfg.stateStore === 'mongodb' && env.MONGODB_URI) {
    try {
      const mongoUrl = new URL(env.MONGODB_URI);
      if (mongoUrl.protocol !== 'mongodb:' && mongoUrl.protocol !== 'mongodb+srv:') {
        errors.push('MONGODB_URI must use mongodb:// or mongodb+srv:// protocol');
      }
    } catch {
      errors.push('Invalid MONGODB_URI format');
    }
  }

  return {errors, warnings};
}

/**
 * Validates configuration, logging warnings.
 * @throws Error listing every invalid setting
 */
export function validateConfig(env: Env = process.env): void {
  const {errors, warnings} = checkConfig(env);
  for (const warning of warnings) {
    console.warn(`[Config] ${warning}`);
  }
  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\nPlease check your .env file and environment variables.`;
    console.error('[Config] Validation errors:', errors);
    throw new Error(errorMessage);
  }
}

function mask(value: string): string {
  return value ? '***configured***' : 'not set';
}

export function logConfig(cfg: AppConfig): void {
  console.log('[Config] Configuration loaded', {
    port: cfg.port,
    nodeEnv: cfg.nodeEnv,
    allowedOrigins: cfg.allowedOrigins,
    googleClientId: cfg.google.clientId
      ? `${cfg.google.clientId.substring(0, 20)}...`
      : 'not set',
    googleClientSecret: mask(cfg.google.clientSecret),
    googleRefreshToken: mask(cfg.google.refreshToken),
    calendarId: cfg.google.calendarId,
    gmailQuery: cfg.google.gmailQuery,
    aiGatewayApiKey: mask(cfg.extraction.apiKey),
    extractionModel: cfg.extraction.model,
    normalization: cfg.normalization,
    sync: cfg.sync,
    poller: cfg.poller,
    stateStore: cfg.stateStore,
  });
}

export const config: AppConfig = loadConfig();
