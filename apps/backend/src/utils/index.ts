export {
  configureLogging, getMetrics, logEvent, logRequest, resetMetrics,
  type CacheLayer, type LogLevel
} from './metrics';
