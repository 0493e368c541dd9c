import type { AppConfig } from '../config';
import { DEMO_PRICING, LYFT_PRICING, UBER_PRICING } from '../config/pricing';
import { ProviderRegistry } from '../services/ProviderRegistry';
import { createDemoAdapter } from './DemoAdapter';
import { LyftAdapter } from './LyftAdapter';
import { UberAdapter } from './UberAdapter';

export * from './ProviderAdapter';
export { UberAdapter } from './UberAdapter';
export { LyftAdapter } from './LyftAdapter';
export { createDemoAdapter } from './DemoAdapter';

/**
 * Build the registry from configuration.
 * Live providers are always registered: without credentials they report
 * access_denied and fall back to their simulated pricing.
 */
export function createRegistry(config: AppConfig['providers']): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.register(new UberAdapter({
    serverToken: config.uber.serverToken,
    timeoutMs: config.uber.timeoutMs,
    priority: config.uber.priority,
    simulation: UBER_PRICING,
  }));

  registry.register(new LyftAdapter({
    clientId: config.lyft.clientId,
    clientSecret: config.lyft.clientSecret,
    timeoutMs: config.lyft.timeoutMs,
    priority: config.lyft.priority,
    simulation: LYFT_PRICING,
  }));

  if (config.demo.enabled) {
    registry.register(createDemoAdapter({ priority: config.demo.priority, simulation: DEMO_PRICING }));
  }

  return registry;
}
