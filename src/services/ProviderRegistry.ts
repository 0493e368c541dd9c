import type { ProviderAdapter } from '../providers/ProviderAdapter';
import { createLogger } from '../utils/logger';

export interface ProviderRank {
  priority: number;
  /** Registration order, 0 first */
  position: number;
}

export interface ProviderRanking {
  rankOf(name: string): ProviderRank | undefined;
}

export interface ProviderInfo {
  name: string;
  mode: ProviderAdapter['mode'];
  priority: number;
  timeoutMs: number | null;
  canSimulate: boolean;
}

/**
 * Ordered, read-only set of configured provider adapters
 */
export class ProviderRegistry implements ProviderRanking {
  private readonly adapters: Map<string, ProviderAdapter> = new Map();
  private readonly logger = createLogger({ component: 'ProviderRegistry' });

  constructor(adapters: ProviderAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /**
   * Add an adapter; a name already present is kept and the newcomer ignored
   */
  register(adapter: ProviderAdapter): boolean {
    if (this.adapters.has(adapter.name)) {
      this.logger.warn({ provider: adapter.name }, 'Provider already registered');
      return false;
    }

    this.adapters.set(adapter.name, adapter);
    this.logger.info({ provider: adapter.name, mode: adapter.mode, priority: adapter.priority }, 'Registered provider');
    return true;
  }

  list(): ProviderAdapter[] {
    return Array.from(this.adapters.values());
  }

  get(name: string): ProviderAdapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  size(): number {
    return this.adapters.size;
  }

  rankOf(name: string): ProviderRank | undefined {
    const adapter = this.adapters.get(name);
    if (!adapter) {
      return undefined;
    }
    return {
      priority: adapter.priority,
      position: Array.from(this.adapters.keys()).indexOf(name),
    };
  }

  describe(): ProviderInfo[] {
    return this.list().map((adapter) => ({
      name: adapter.name,
      mode: adapter.mode,
      priority: adapter.priority,
      timeoutMs: adapter.mode === 'live' ? adapter.timeoutMs : null,
      canSimulate: adapter.simulation !== undefined,
    }));
  }
}
