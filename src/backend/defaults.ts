export const DEFAULT_IDLE_THRESHOLD_SECONDS = 60;
export const IDLE_CHECK_INTERVAL_MS = 5_000;
export const PERIOD_CHECK_INTERVAL_MS = 1_000;
export const SHUTDOWN_DRAIN_TIMEOUT_MS = 5_000;

/** Record count at which summary statistics switch from in-memory to SQL aggregation. */
export const DEFAULT_SUMMARY_IN_MEMORY_THRESHOLD = 20_000;

export const RECENT_ACTIVITY_DAYS = 30;
export const FALLBACK_LANGUAGE = 'Text';
export const EXPORT_VERSION = '1.0';
