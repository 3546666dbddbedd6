/**
 * Metrics and Logging Utilities
 *
 * Structured logging and in-process counters for the API and the MCP server.
 * Counters live for the lifetime of the process.
 */

export type CacheLayer = 'memory' | 'file';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface CacheMetrics {
  memoryHits: number;
  memoryMisses: number;
  fileHits: number;
  fileMisses: number;
  sourceCalls: number;
  sourceFailures: number;
}

/**
 * Upper bounds (exclusive) for the response time histogram; the last bucket
 * takes everything else
 */
const RESPONSE_TIME_BUCKETS = [
  { key: 'under10ms', label: '<10ms', limitMs: 10 },
  { key: 'under50ms', label: '<50ms', limitMs: 50 },
  { key: 'under100ms', label: '<100ms', limitMs: 100 },
  { key: 'under500ms', label: '<500ms', limitMs: 500 },
  { key: 'over500ms', label: '>500ms', limitMs: Number.POSITIVE_INFINITY },
] as const;

type ResponseTimeBuckets = Record<
  (typeof RESPONSE_TIME_BUCKETS)[number]['key'],
  number
>;

interface MetricsState {
  cache: CacheMetrics;
  responseTimes: ResponseTimeBuckets;
  requestCount: number;
  errorCount: number;
  predictionCount: number;
  startTime: number;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const createInitialState = (): MetricsState => ({
  cache: {
    memoryHits: 0,
    memoryMisses: 0,
    fileHits: 0,
    fileMisses: 0,
    sourceCalls: 0,
    sourceFailures: 0,
  },
  responseTimes: {
    under10ms: 0,
    under50ms: 0,
    under100ms: 0,
    under500ms: 0,
    over500ms: 0,
  },
  requestCount: 0,
  errorCount: 0,
  predictionCount: 0,
  startTime: Date.now(),
});

let metricsState: MetricsState = createInitialState();

let minLogLevel: LogLevel = 'info';

/**
 * When set, every log line goes to stderr. The MCP stdio transport owns
 * stdout, so the MCP entry point turns this on before anything logs.
 */
let stderrOnly = false;

export const configureLogging = (options: {
  level?: LogLevel;
  stderrOnly?: boolean;
}): void => {
  if (options.level) {
    minLogLevel = options.level;
  }
  if (options.stderrOnly !== undefined) {
    stderrOnly = options.stderrOnly;
  }
};

/**
 * Record a cache hit
 */
export const recordCacheHit = (layer: CacheLayer): void => {
  if (layer === 'memory') {
    metricsState.cache.memoryHits++;
  } else {
    metricsState.cache.fileHits++;
  }
};

/**
 * Record a cache miss
 */
export const recordCacheMiss = (layer: CacheLayer): void => {
  if (layer === 'memory') {
    metricsState.cache.memoryMisses++;
  } else {
    metricsState.cache.fileMisses++;
  }
};

/**
 * Record a response time
 */
export const recordResponseTime = (timeMs: number): void => {
  metricsState.requestCount++;

  const bucket =
    RESPONSE_TIME_BUCKETS.find(({ limitMs }) => timeMs < limitMs) ??
    RESPONSE_TIME_BUCKETS[RESPONSE_TIME_BUCKETS.length - 1];
  metricsState.responseTimes[bucket.key]++;
};

export const recordError = (): void => {
  metricsState.errorCount++;
};

export const recordPrediction = (): void => {
  metricsState.predictionCount++;
};

const formatRate = (part: number, total: number): string =>
  `${((part / total) * 100).toFixed(2)}%`;

/**
 * Bucket holding the median request, or N/A before the first request
 */
const findMedianBucket = (): string => {
  const half = metricsState.requestCount / 2;
  let seen = 0;

  for (const { key, label } of RESPONSE_TIME_BUCKETS) {
    seen += metricsState.responseTimes[key];
    if (metricsState.requestCount > 0 && seen >= half) {
      return label;
    }
  }
  return 'N/A';
};

/**
 * Get current metrics snapshot
 */
export const getMetrics = (): {
  cache: CacheMetrics & { hitRate: string };
  responseTimes: ResponseTimeBuckets & { p50Bucket: string };
  requests: { total: number; errors: number; errorRate: string };
  predictions: number;
  uptime: number;
} => {
  const { cache, requestCount, errorCount } = metricsState;
  const hits = cache.memoryHits + cache.fileHits;
  const lookups = hits + cache.memoryMisses + cache.fileMisses;

  return {
    cache: {
      ...cache,
      hitRate: lookups > 0 ? formatRate(hits, lookups) : 'N/A',
    },
    responseTimes: {
      ...metricsState.responseTimes,
      p50Bucket: findMedianBucket(),
    },
    requests: {
      total: requestCount,
      errors: errorCount,
      errorRate: requestCount > 0 ? formatRate(errorCount, requestCount) : '0%',
    },
    predictions: metricsState.predictionCount,
    uptime: Date.now() - metricsState.startTime,
  };
};

/**
 * Reset metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  metricsState = createInitialState();
};

/**
 * Log structured event
 */
export const logEvent = (
  event: string,
  data: Record<string, unknown> = {},
  level: LogLevel = 'info'
): void => {
  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLogLevel]) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    event,
    ...data,
  });

  switch (level) {
    case 'error':
      console.error(`❌ [${event}]`, line);
      break;
    case 'warn':
      console.warn(`⚠️ [${event}]`, line);
      break;
    case 'debug':
      (stderrOnly ? console.error : console.debug)(`🔍 [${event}]`, line);
      break;
    default:
      (stderrOnly ? console.error : console.log)(`ℹ️ [${event}]`, line);
  }
};

/**
 * Log cache operation
 */
export const logCacheOperation = (
  operation: 'get' | 'set' | 'delete' | 'clear',
  layer: CacheLayer,
  key: string,
  hit: boolean
): void => {
  if (operation === 'get') {
    if (hit) {
      recordCacheHit(layer);
    } else {
      recordCacheMiss(layer);
    }
  }

  logEvent('cache_operation', {
    operation,
    layer,
    key: key.slice(0, 50), // Truncate for logging
    hit,
  }, 'debug');
};

/**
 * Log a call to the upstream statistics source
 */
export const logSourceCall = (
  endpoint: string,
  success: boolean,
  durationMs: number,
  error?: string
): void => {
  metricsState.cache.sourceCalls++;
  if (!success) {
    metricsState.cache.sourceFailures++;
  }

  logEvent('source_call', {
    endpoint,
    success,
    durationMs,
    error,
  }, success ? 'info' : 'error');
};

/**
 * Log request completion
 */
export const logRequest = (
  path: string,
  method: string,
  statusCode: number,
  durationMs: number
): void => {
  recordResponseTime(durationMs);

  if (statusCode >= 500) {
    recordError();
  }

  logEvent('request', {
    path,
    method,
    statusCode,
    durationMs,
  }, statusCode >= 500 ? 'error' : 'info');
};
