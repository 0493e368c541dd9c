import type { LiveProviderAdapter, SimulatedFare } from '../providers/ProviderAdapter';
import type { EstimateSource, NormalizedEstimate, NonViableEstimate, QuoteFields } from '../types/Ride';
import { formatMinorUnits, roundHalfUp, toMinorUnits } from '../utils/money';
import type { RoundingPolicy } from '../utils/money';

/**
 * Normalizer
 * Turns provider quotes and simulated fares into estimates in one comparison
 * currency. Bad input yields a non-viable estimate, never an exception.
 */

/** Confidence taken off every simulated estimate */
export const SIMULATION_CONFIDENCE_DISCOUNT = 0.25;

export const SIMULATED_NOTE = 'Simulated approximation, not a live quote';

export interface CurrencySettings {
  code: string;
  /** Digits of the minor unit (2 for USD cents) */
  minorDigits: number;
}

export interface NormalizationPolicy {
  currency: CurrencySettings;
  /** Units of the comparison currency per unit of the keyed currency */
  exchangeRates: Record<string, number>;
  round?: RoundingPolicy;
}

export function normalizeQuote<TRaw>(
  adapter: LiveProviderAdapter<TRaw>,
  raw: TRaw,
  policy: NormalizationPolicy
): NormalizedEstimate {
  let fields: QuoteFields | null | undefined;
  try {
    fields = adapter.parseQuote(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return nonViableEstimate(adapter.name, 'live', policy, `malformed quote: ${message}`);
  }

  if (typeof fields !== 'object' || fields === null) {
    return nonViableEstimate(adapter.name, 'live', policy, 'malformed quote: no quote fields');
  }

  return buildEstimate(adapter.name, 'live', fields, policy, 1);
}

export function normalizeSimulatedFare(
  provider: string,
  fare: SimulatedFare,
  policy: NormalizationPolicy
): NormalizedEstimate {
  return buildEstimate(
    provider,
    'simulated',
    fare,
    policy,
    1 - SIMULATION_CONFIDENCE_DISCOUNT,
    SIMULATED_NOTE
  );
}

export function nonViableEstimate(
  provider: string,
  source: EstimateSource,
  policy: NormalizationPolicy,
  reason: string
): NonViableEstimate {
  return {
    provider,
    viable: false,
    source,
    currency: policy.currency.code,
    reason,
  };
}

function buildEstimate(
  provider: string,
  source: EstimateSource,
  fields: QuoteFields,
  policy: NormalizationPolicy,
  confidence: number,
  note?: string
): NormalizedEstimate {
  const issue = findFieldIssue(fields);
  if (issue) {
    return nonViableEstimate(provider, source, policy, `malformed quote: ${issue}`);
  }

  const rate = exchangeRate(fields.currency, policy);
  if (rate === undefined) {
    return nonViableEstimate(provider, source, policy, `no exchange rate for ${fields.currency}`);
  }

  const { minorDigits, code } = policy.currency;
  const round = policy.round ?? roundHalfUp;
  const amountMinor = toMinorUnits(fields.amount * rate, minorDigits, round);

  return {
    provider,
    viable: true,
    source,
    amountMinor,
    amount: formatMinorUnits(amountMinor, minorDigits),
    currency: code,
    ...(fields.upperAmount !== undefined && {
      upperAmountMinor: toMinorUnits(fields.upperAmount * rate, minorDigits, round),
    }),
    ...(fields.durationSeconds !== undefined && {
      durationSeconds: Math.round(fields.durationSeconds),
    }),
    confidence,
    ...(note !== undefined && { note }),
  };
}

function findFieldIssue(fields: QuoteFields): string | null {
  const { amount, currency, upperAmount, durationSeconds } = fields;

  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    return 'amount is not a number';
  }
  if (amount < 0) {
    return `negative amount ${amount}`;
  }
  if (typeof currency !== 'string' || currency.trim() === '') {
    return 'currency is missing';
  }
  if (upperAmount !== undefined && (!Number.isFinite(upperAmount) || upperAmount < amount)) {
    return `upper amount ${upperAmount} is below amount ${amount}`;
  }
  if (durationSeconds !== undefined && (!Number.isFinite(durationSeconds) || durationSeconds < 0)) {
    return `invalid duration ${durationSeconds}`;
  }
  return null;
}

function exchangeRate(currency: string, policy: NormalizationPolicy): number | undefined {
  const code = currency.trim().toUpperCase();
  if (code === policy.currency.code) {
    return 1;
  }
  const rate: number | undefined = policy.exchangeRates[code];
  return rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : undefined;
}
