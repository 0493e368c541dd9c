import { describe, it, expect } from 'vitest';
import { decide } from '../DecisionEngine';
import type { ProviderRank, ProviderRanking } from '../ProviderRegistry';
import type { EstimateSource, NonViableEstimate, ViableEstimate } from '../../types/Ride';
import { formatMinorUnits } from '../../utils/money';
import { NYC_REQUEST } from '../../test/fakeProviders';

function viable(provider: string, amountMinor: number, source: EstimateSource = 'live'): ViableEstimate {
  return {
    provider,
    viable: true,
    source,
    amountMinor,
    amount: formatMinorUnits(amountMinor, 2),
    currency: 'USD',
    confidence: source === 'live' ? 1 : 0.75,
  };
}

function nonViable(provider: string, reason = 'no coverage'): NonViableEstimate {
  return { provider, viable: false, source: 'live', currency: 'USD', reason };
}

function rankingOf(ranks: Record<string, ProviderRank>): ProviderRanking {
  return { rankOf: (name) => ranks[name] };
}

const RANKING = rankingOf({
  a: { priority: 0, position: 0 },
  b: { priority: 0, position: 1 },
  c: { priority: 0, position: 2 },
});

describe('decide', () => {
  it('should pick the lowest amount', () => {
    const estimates = [viable('a', 1850), viable('b', 1600), viable('c', 2000)];

    const result = decide(NYC_REQUEST, 'USD', estimates, RANKING);

    expect(result.status).toBe('selected');
    expect(result.winner?.provider).toBe('b');
    if (result.status === 'selected') {
      expect(result.decidedBy).toBe('lowest_amount');
    }
  });

  it('should let a cheaper simulated estimate beat a live one', () => {
    const result = decide(NYC_REQUEST, 'USD', [viable('a', 1850), viable('b', 1600, 'simulated')], RANKING);

    expect(result.winner).toMatchObject({ provider: 'b', source: 'simulated' });
  });

  it('should prefer live over simulated at the same amount', () => {
    const result = decide(NYC_REQUEST, 'USD', [viable('a', 1500, 'simulated'), viable('b', 1500)], RANKING);

    expect(result).toMatchObject({ status: 'selected', winner: { provider: 'b' }, decidedBy: 'live_over_simulated' });
  });

  it('should prefer the higher priority at the same amount and source', () => {
    const ranking = rankingOf({
      a: { priority: 2, position: 0 },
      b: { priority: 1, position: 1 },
    });

    const result = decide(NYC_REQUEST, 'USD', [viable('b', 1500), viable('a', 1500)], ranking);

    expect(result).toMatchObject({ status: 'selected', winner: { provider: 'a' }, decidedBy: 'registry_priority' });
  });

  it('should fall back to registration order', () => {
    const result = decide(NYC_REQUEST, 'USD', [viable('c', 1500), viable('b', 1500)], RANKING);

    expect(result).toMatchObject({ status: 'selected', winner: { provider: 'b' }, decidedBy: 'registry_order' });
  });

  it('should rank unknown providers after registered ones', () => {
    const result = decide(NYC_REQUEST, 'USD', [viable('stranger', 1500), viable('c', 1500)], RANKING);

    expect(result.winner?.provider).toBe('c');
  });

  it('should ignore non-viable estimates', () => {
    const estimates = [nonViable('a'), viable('b', 2400)];

    const result = decide(NYC_REQUEST, 'USD', estimates, RANKING);

    expect(result.winner?.provider).toBe('b');
    expect(result.estimates).toEqual(estimates);
  });

  it('should report no viable provider when nothing can be priced', () => {
    const estimates = [nonViable('a'), nonViable('b', 'simulation-only provider; no simulation pricing configured')];

    const result = decide(NYC_REQUEST, 'USD', estimates, RANKING);

    expect(result).toEqual({
      status: 'no_viable_provider',
      request: NYC_REQUEST,
      currency: 'USD',
      estimates,
      winner: null,
    });
  });

  it('should return the estimates in the order given', () => {
    const estimates = [viable('c', 900), nonViable('a'), viable('b', 700)];

    const result = decide(NYC_REQUEST, 'USD', estimates, RANKING);

    expect(result.estimates.map((estimate) => estimate.provider)).toEqual(['c', 'a', 'b']);
  });

  it('should never pick an estimate dearer than another viable one', () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed;
    };

    for (let round = 0; round < 50; round++) {
      const estimates = ['a', 'b', 'c'].map((name) =>
        next() % 4 === 0 ? nonViable(name) : viable(name, 1000 + (next() % 5) * 100, next() % 2 === 0 ? 'live' : 'simulated')
      );

      const result = decide(NYC_REQUEST, 'USD', estimates, RANKING);
      const amounts = estimates.flatMap((estimate) => (estimate.viable ? [estimate.amountMinor] : []));

      if (amounts.length === 0) {
        expect(result.status).toBe('no_viable_provider');
      } else {
        expect(result.winner?.amountMinor).toBe(Math.min(...amounts));
      }
    }
  });
});
