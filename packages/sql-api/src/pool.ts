// packages/sql-api/src/pool.ts
import { Agent } from 'undici';

/**
 * Lazily created process-wide handle. The pending promise is stored before
 * the factory settles, so concurrent first callers share one instance; the
 * first caller's factory wins. A failed factory clears the slot.
 */
export class SharedHandle<T> {
  private pending?: Promise<T>;

  get(factory: () => T | Promise<T>): Promise<T> {
    if (!this.pending) {
      const created = Promise.resolve().then(factory);
      this.pending = created;
      void created.catch(() => {
        if (this.pending === created) this.pending = undefined;
      });
    }
    return this.pending;
  }

  isInitialized(): boolean {
    return this.pending !== undefined;
  }

  async reset(dispose?: (value: T) => Promise<void>): Promise<void> {
    const current = this.pending;
    this.pending = undefined;
    if (current && dispose) await dispose(await current);
  }
}

export interface PoolOptions {
  connections?: number;
  keepAliveTimeoutMs?: number;
}

const sharedAgent = new SharedHandle<Agent>();

export function getSharedAgent(options: PoolOptions = {}): Promise<Agent> {
  return sharedAgent.get(() => new Agent({
    connections: options.connections ?? 10,
    keepAliveTimeout: options.keepAliveTimeoutMs ?? 30_000,
  }));
}

export function closeSharedAgent(): Promise<void> {
  return sharedAgent.reset((agent) => agent.close());
}
