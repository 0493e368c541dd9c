import type {
  ComparisonResult,
  DecisionRule,
  NormalizedEstimate,
  RideRequest,
  ViableEstimate,
} from '../types/Ride';
import type { ProviderRank, ProviderRanking } from './ProviderRegistry';

// Providers missing from the ranking sort after every registered one
const UNRANKED: ProviderRank = { priority: Number.NEGATIVE_INFINITY, position: Number.POSITIVE_INFINITY };

/**
 * Pick the cheapest viable estimate.
 *
 * Ties on amount are broken by, in order: live over simulated, higher registry
 * priority, earlier registry position. `estimates` is returned untouched so the
 * caller can show everything that was considered.
 */
export function decide(
  request: RideRequest,
  currency: string,
  estimates: NormalizedEstimate[],
  ranking: ProviderRanking
): ComparisonResult {
  const viable = estimates.filter((estimate): estimate is ViableEstimate => estimate.viable);

  if (viable.length === 0) {
    return {
      status: 'no_viable_provider',
      request,
      currency,
      estimates,
      winner: null,
    };
  }

  const rankOf = (estimate: ViableEstimate) => ranking.rankOf(estimate.provider) ?? UNRANKED;

  let winner = viable[0];
  for (const candidate of viable.slice(1)) {
    if (compareEstimates(candidate, winner, rankOf) < 0) {
      winner = candidate;
    }
  }

  return {
    status: 'selected',
    request,
    currency,
    estimates,
    winner,
    decidedBy: explainDecision(winner, viable, rankOf),
  };
}

/**
 * Negative when `a` should win over `b`
 */
function compareEstimates(
  a: ViableEstimate,
  b: ViableEstimate,
  rankOf: (estimate: ViableEstimate) => ProviderRank
): number {
  if (a.amountMinor !== b.amountMinor) {
    return a.amountMinor - b.amountMinor;
  }
  if (a.source !== b.source) {
    return a.source === 'live' ? -1 : 1;
  }
  const rankA = rankOf(a);
  const rankB = rankOf(b);
  if (rankA.priority !== rankB.priority) {
    return rankA.priority > rankB.priority ? -1 : 1;
  }
  if (rankA.position !== rankB.position) {
    return rankA.position < rankB.position ? -1 : 1;
  }
  return 0;
}

/**
 * Name the first rule that separated the winner from the runners-up at its amount
 */
function explainDecision(
  winner: ViableEstimate,
  viable: ViableEstimate[],
  rankOf: (estimate: ViableEstimate) => ProviderRank
): DecisionRule {
  let tied = viable.filter((estimate) => estimate !== winner && estimate.amountMinor === winner.amountMinor);
  if (tied.length === 0) {
    return 'lowest_amount';
  }

  tied = tied.filter((estimate) => estimate.source === winner.source);
  if (tied.length === 0) {
    return 'live_over_simulated';
  }

  const winnerPriority = rankOf(winner).priority;
  tied = tied.filter((estimate) => rankOf(estimate).priority === winnerPriority);
  if (tied.length === 0) {
    return 'registry_priority';
  }

  return 'registry_order';
}
