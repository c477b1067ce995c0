import { executionContextSchema, type WorkflowExecutionContext } from './types';

/**
 * Keyed, TTL-bound storage for execution state plus a secondary index from an
 * external subject (for example a user id) to an execution id. Each execution id has
 * a single writer; readers see the latest completed write.
 */
export interface ExecutionStore {
  put(executionId: string, context: WorkflowExecutionContext, ttlMs: number): Promise<void>;
  get(executionId: string): Promise<WorkflowExecutionContext | null>;
  putIndex(secondaryKey: string, executionId: string, ttlMs: number): Promise<void>;
  getByIndex(secondaryKey: string): Promise<string | null>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export interface MemoryExecutionStoreOptions {
  now?: () => number;
}

export class MemoryExecutionStore implements ExecutionStore {
  private readonly contexts = new Map<string, Entry<WorkflowExecutionContext>>();
  private readonly index = new Map<string, Entry<string>>();
  private readonly now: () => number;

  constructor(options: MemoryExecutionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async put(executionId: string, context: WorkflowExecutionContext, ttlMs: number): Promise<void> {
    // Copies on the way in and out keep callers from mutating stored state.
    this.contexts.set(executionId, { value: structuredClone(context), expiresAt: this.now() + ttlMs });
  }

  async get(executionId: string): Promise<WorkflowExecutionContext | null> {
    const entry = this.read(this.contexts, executionId);
    return entry ? structuredClone(entry) : null;
  }

  async putIndex(secondaryKey: string, executionId: string, ttlMs: number): Promise<void> {
    this.index.set(secondaryKey, { value: executionId, expiresAt: this.now() + ttlMs });
  }

  async getByIndex(secondaryKey: string): Promise<string | null> {
    return this.read(this.index, secondaryKey);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.contexts.clear();
    this.index.clear();
  }

  private read<T>(map: Map<string, Entry<T>>, key: string): T | null {
    const entry = map.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      map.delete(key);
      return null;
    }
    return entry.value;
  }
}

/** The slice of the ioredis client the store relies on. */
export interface RedisLike {
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface RedisExecutionStoreOptions {
  keyPrefix?: string;
  ownsClient?: boolean;
}

export class RedisExecutionStore implements ExecutionStore {
  private readonly keyPrefix: string;
  private readonly ownsClient: boolean;

  constructor(
    private readonly client: RedisLike,
    options: RedisExecutionStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'orchestrator';
    this.ownsClient = options.ownsClient ?? false;
  }

  async put(executionId: string, context: WorkflowExecutionContext, ttlMs: number): Promise<void> {
    await this.client.set(this.executionKey(executionId), JSON.stringify(context), 'PX', ttlMs);
  }

  async get(executionId: string): Promise<WorkflowExecutionContext | null> {
    const raw = await this.client.get(this.executionKey(executionId));
    if (raw === null) {
      return null;
    }
    const parsed = executionContextSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Stored execution ${executionId} is corrupt: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async putIndex(secondaryKey: string, executionId: string, ttlMs: number): Promise<void> {
    await this.client.set(this.indexKey(secondaryKey), executionId, 'PX', ttlMs);
  }

  async getByIndex(secondaryKey: string): Promise<string | null> {
    return this.client.get(this.indexKey(secondaryKey));
  }

  async ping(): Promise<boolean> {
    const reply = await this.client.ping();
    return reply === 'PONG';
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit();
    }
  }

  private executionKey(executionId: string): string {
    return `${this.keyPrefix}:execution:${executionId}`;
  }

  private indexKey(secondaryKey: string): string {
    return `${this.keyPrefix}:index:${secondaryKey}`;
  }
}
