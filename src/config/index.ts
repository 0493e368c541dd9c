import type { CurrencySettings } from '../services/Normalizer';
import { USD_EXCHANGE_RATES } from './pricing';

/**
 * Runtime configuration, read from the environment (.env via dotenv)
 */

export type GeocoderProvider = 'openstreetmap' | 'mapbox' | 'google';

export interface LiveProviderSettings {
  timeoutMs: number;
  priority: number;
}

export interface AppConfig {
  port: number;
  comparison: {
    currency: CurrencySettings;
    exchangeRates: Record<string, number>;
    deadlineMs: number;
  };
  providers: {
    uber: LiveProviderSettings & { serverToken: string };
    lyft: LiveProviderSettings & { clientId: string; clientSecret: string };
    demo: { enabled: boolean; priority: number };
  };
  geocoder: {
    provider: GeocoderProvider;
    apiKey: string;
  };
}

const GEOCODER_PROVIDERS: readonly GeocoderProvider[] = ['openstreetmap', 'mapbox', 'google'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const currencyCode = (env.COMPARISON_CURRENCY || 'USD').trim().toUpperCase();
  const geocoderProvider = env.GEOCODER_PROVIDER || 'openstreetmap';

  if (!isGeocoderProvider(geocoderProvider)) {
    throw new Error(`GEOCODER_PROVIDER must be one of ${GEOCODER_PROVIDERS.join(', ')}, got '${geocoderProvider}'`);
  }

  return {
    port: readInteger(env, 'PORT', 3000),
    comparison: {
      currency: { code: currencyCode, minorDigits: minorDigitsOf(currencyCode) },
      exchangeRates: rebaseRates(USD_EXCHANGE_RATES, currencyCode),
      deadlineMs: readInteger(env, 'COMPARISON_DEADLINE_MS', 8000),
    },
    providers: {
      uber: {
        serverToken: env.UBER_SERVER_TOKEN ?? '',
        timeoutMs: readInteger(env, 'UBER_TIMEOUT_MS', 5000),
        priority: readInteger(env, 'UBER_PRIORITY', 2),
      },
      lyft: {
        clientId: env.LYFT_CLIENT_ID ?? '',
        clientSecret: env.LYFT_CLIENT_SECRET ?? '',
        timeoutMs: readInteger(env, 'LYFT_TIMEOUT_MS', 5000),
        priority: readInteger(env, 'LYFT_PRIORITY', 1),
      },
      demo: {
        enabled: env.USE_DEMO !== 'false', // Default: enabled
        priority: readInteger(env, 'DEMO_PRIORITY', 0),
      },
    },
    geocoder: {
      provider: geocoderProvider,
      apiKey: env.GEOCODER_API_KEY ?? '',
    },
  };
}

function isGeocoderProvider(value: string): value is GeocoderProvider {
  return GEOCODER_PROVIDERS.some((provider) => provider === value);
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

function minorDigitsOf(code: string): number {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency: code }).resolvedOptions().maximumFractionDigits ?? 2;
  } catch {
    throw new Error(`COMPARISON_CURRENCY '${code}' is not an ISO 4217 currency code`);
  }
}

/**
 * Re-express USD-based rates against another comparison currency
 */
export function rebaseRates(usdRates: Record<string, number>, code: string): Record<string, number> {
  const base = usdRates[code];
  if (base === undefined) {
    throw new Error(`No exchange rate known for comparison currency ${code}`);
  }
  return Object.fromEntries(
    Object.entries(usdRates).map(([currency, rate]) => [currency, rate / base])
  );
}
