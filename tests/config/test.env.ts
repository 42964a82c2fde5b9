// Central test env loader for all suites
process.env.TZ = process.env.TZ || 'UTC';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

// Keep searches fast; the defaults space them five seconds apart
process.env.SEARCH_MIN_INTERVAL_MS = '0';
process.env.SEARCH_RETRY_DELAY_MS = '0';

export {};
