// Load environment variables before anything reads them
import 'dotenv/config';
import { createServer } from './api/server';
import { loadConfig } from './config';
import { createRegistry } from './providers';
import { FareComparator } from './services/FareComparator';
import { PlaceGeocoder } from './services/PlaceGeocoder';
import { logger } from './utils/logger';

logger.info('🚀 Starting ridewise...');

const config = loadConfig();

const registry = createRegistry(config.providers);

if (!config.providers.uber.serverToken) {
  logger.warn('⚠️  UBER_SERVER_TOKEN not set, Uber prices will be simulated');
}
if (!config.providers.lyft.clientId || !config.providers.lyft.clientSecret) {
  logger.warn('⚠️  LYFT_CLIENT_ID / LYFT_CLIENT_SECRET not set, Lyft prices will be simulated');
}

const comparator = new FareComparator(registry, {
  policy: {
    currency: config.comparison.currency,
    exchangeRates: config.comparison.exchangeRates,
  },
  deadlineMs: config.comparison.deadlineMs,
});

const geocoder = new PlaceGeocoder({
  provider: config.geocoder.provider,
  apiKey: config.geocoder.apiKey,
});

const app = createServer({ comparator, geocoder });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, providers: registry.size() }, `✅ Server running on http://localhost:${config.port}`);
  logger.info('📊 API endpoints:');
  logger.info('   GET  /health              - Health check');
  logger.info('   GET  /api/providers       - Configured providers');
  logger.info('   POST /api/compare         - Compare fares between coordinates (JSON)');
  logger.info('   GET  /api/compare/text    - Compare fares between place names (?pickup&dropoff&vehicle_need)');
  logger.info('   POST /api/compare/text    - Same, with a JSON body');
});

// Graceful shutdown
const shutdown = () => {
  logger.info('🛑 Shutting down gracefully...');
  server.close(() => {
    logger.info('✅ Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
