/**
 * State Store Configuration
 *
 * Reads the store settings from the environment and picks the backend once
 * at startup: Redis when it answers a PING, otherwise process memory for the
 * rest of the process lifetime.
 */

import { createClient } from 'redis';
import { StateStoreBackend } from '../types/common.js';
import { StoreUnavailableError, errorMessage } from '../types/error-handling.js';
import { logError, withTimeout } from '../services/error-handling-service.js';
import { createLogger } from '../utils/logger.js';
import {
  IProjectStateStore,
  InMemoryProjectStateStore,
  KeyValueClient,
  RedisProjectStateStore
} from './project-state-store.js';

const logger = createLogger('StateStore');

/** Extra time allowed for PING beyond the socket connect timeout */
const PROBE_GRACE_MS = 1000;

// ==================== Types ====================

export interface RedisConnectionConfig {
  host: string;
  port: number;
  /** Empty means no AUTH */
  password: string;
  connectTimeoutMs: number;
}

export interface StateStoreConfig {
  /** Preferred backend; 'redis' falls back to memory when unreachable */
  backend: StateStoreBackend;
  redis: RedisConnectionConfig;
}

export interface StateStoreOverrides {
  backend?: StateStoreBackend;
  redis?: Partial<RedisConnectionConfig>;
}

/**
 * Opens a connected key-value client or rejects
 */
export type KeyValueConnector = (config: RedisConnectionConfig) => Promise<KeyValueClient>;

export interface StateStoreSelection {
  store: IProjectStateStore;
  usingFallback: boolean;
  /** Why the preferred backend was not used */
  diagnostic?: StoreUnavailableError;
}

// ==================== Default Configuration ====================

function parsePositiveInt(value: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 && parsed <= max ? parsed : fallback;
}

export function getDefaultStateStoreConfig(env: NodeJS.ProcessEnv = process.env): StateStoreConfig {
  return {
    backend: env.STATE_STORE_BACKEND === 'memory' ? 'memory' : 'redis',
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: parsePositiveInt(env.REDIS_PORT, 6379, 65535),
      password: env.REDIS_PASSWORD || '',
      connectTimeoutMs: parsePositiveInt(env.REDIS_CONNECT_TIMEOUT_MS, 2000),
    },
  };
}

// ==================== Redis Connector ====================

/**
 * Connects with node-redis and probes with PING. Reconnects are disabled:
 * the backend choice is made once.
 */
export const connectRedis: KeyValueConnector = async (config) => {
  const client = createClient({
    socket: {
      host: config.host,
      port: config.port,
      connectTimeout: config.connectTimeoutMs,
      reconnectStrategy: false,
    },
    password: config.password || undefined,
  });
  client.on('error', (error: unknown) => logger.warn('Redis client error:', errorMessage(error)));

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    if (client.isOpen) {
      await client.disconnect();
    }
    throw error;
  }

  return {
    get: (key) => client.get(key),
    set: (key, value) => client.set(key, value),
    ping: () => client.ping(),
    quit: () => client.quit(),
  };
};

// ==================== Initialization ====================

/**
 * Quits a client whose connect finished after the probe gave up on it
 */
function releaseLateClient(connecting: Promise<KeyValueClient>): void {
  void connecting
    .then(client => client.quit())
    .catch((error: unknown) => logger.debug('Discarded Redis client:', errorMessage(error)));
}

/**
 * Select the state store backend for this process
 */
export async function initializeStateStore(
  config: StateStoreOverrides = {},
  connect: KeyValueConnector = connectRedis
): Promise<StateStoreSelection> {
  const defaults = getDefaultStateStoreConfig();
  const resolved: StateStoreConfig = {
    backend: config.backend ?? defaults.backend,
    redis: { ...defaults.redis, ...config.redis },
  };

  if (resolved.backend === 'memory') {
    logger.info('Using in-memory state storage');
    return { store: new InMemoryProjectStateStore(), usingFallback: false };
  }

  const { host, port, connectTimeoutMs } = resolved.redis;
  const connecting = connect(resolved.redis);
  try {
    const client = await withTimeout(
      connecting,
      connectTimeoutMs + PROBE_GRACE_MS,
      `Redis connection to ${host}:${port}`
    );
    logger.info(`Redis connection established at ${host}:${port}`);
    return { store: new RedisProjectStateStore(client), usingFallback: false };
  } catch (error) {
    const diagnostic = new StoreUnavailableError(
      'redis',
      `Redis connection to ${host}:${port} failed: ${errorMessage(error)}`
    );
    logError(diagnostic, { host, port });
    releaseLateClient(connecting);
    logger.warn('Falling back to in-memory state storage');
    return { store: new InMemoryProjectStateStore(), usingFallback: true, diagnostic };
  }
}
