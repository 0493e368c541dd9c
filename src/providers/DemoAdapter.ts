import type { SimulationHeuristic, SimulationOnlyProviderAdapter, SimulationPricing } from './ProviderAdapter';

/**
 * Demo provider for testing and offline use
 * Never makes a network call; every estimate it yields is simulated
 */
export function createDemoAdapter(config: {
  name?: string;
  priority?: number;
  simulation: SimulationPricing;
  heuristic?: SimulationHeuristic;
}): SimulationOnlyProviderAdapter {
  return {
    mode: 'simulation-only',
    name: config.name ?? 'demo',
    priority: config.priority ?? 0,
    simulation: config.simulation,
    heuristic: config.heuristic,
  };
}
