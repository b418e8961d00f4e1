/**
 * Project State Store
 * Persists full ProjectState records under `project:<projectId>` keys,
 * either in process memory or in a networked key-value store.
 */

import { StateStoreBackend } from '../types/common.js';
import { ProjectState } from '../types/project.js';
import { StateCorruptionError, errorMessage } from '../types/error-handling.js';
import { serializeProjectState, deserializeProjectState } from './project-state-codec.js';

/**
 * Interface for the Project State Store
 */
export interface IProjectStateStore {
  readonly backend: StateStoreBackend;
  /** Full overwrite of the stored record */
  save(projectId: string, state: ProjectState): Promise<void>;
  load(projectId: string): Promise<ProjectState | null>;
  close(): Promise<void>;
}

/**
 * The subset of a Redis client the store needs
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export function projectKey(projectId: string): string {
  return `project:${projectId}`;
}

function decodeRecord(key: string, serialized: string): ProjectState {
  try {
    return deserializeProjectState(serialized);
  } catch (error) {
    throw new StateCorruptionError(key, `Stored record ${key} could not be decoded: ${errorMessage(error)}`);
  }
}

/**
 * In-memory implementation of the Project State Store
 */
export class InMemoryProjectStateStore implements IProjectStateStore {
  readonly backend: StateStoreBackend = 'memory';
  private records: Map<string, string> = new Map();

  async save(projectId: string, state: ProjectState): Promise<void> {
    this.records.set(projectKey(projectId), serializeProjectState(state));
  }

  async load(projectId: string): Promise<ProjectState | null> {
    const key = projectKey(projectId);
    const serialized = this.records.get(key);
    return serialized === undefined ? null : decodeRecord(key, serialized);
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  /**
   * Number of stored projects
   */
  size(): number {
    return this.records.size;
  }
}

/**
 * Redis-backed implementation of the Project State Store
 */
export class RedisProjectStateStore implements IProjectStateStore {
  readonly backend: StateStoreBackend = 'redis';

  constructor(private client: KeyValueClient) {}

  async save(projectId: string, state: ProjectState): Promise<void> {
    await this.client.set(projectKey(projectId), serializeProjectState(state));
  }

  async load(projectId: string): Promise<ProjectState | null> {
    const key = projectKey(projectId);
    const serialized = await this.client.get(key);
    return serialized === null ? null : decodeRecord(key, serialized);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
