import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  configureLogging,
  getMetrics,
  logCacheOperation,
  logEvent,
  logRequest,
  logSourceCall,
  resetMetrics,
} from './metrics';

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    configureLogging({ level: 'info', stderrOnly: false });
    vi.restoreAllMocks();
  });

  it('computes the cache hit rate across layers', () => {
    logCacheOperation('get', 'memory', 'a', true);
    logCacheOperation('get', 'file', 'b', true);
    logCacheOperation('get', 'file', 'c', true);
    logCacheOperation('get', 'file', 'd', false);
    logCacheOperation('set', 'file', 'd', true);

    const { cache } = getMetrics();

    expect(cache.memoryHits).toBe(1);
    expect(cache.fileHits).toBe(2);
    expect(cache.fileMisses).toBe(1);
    expect(cache.hitRate).toBe('75.00%');
  });

  it('buckets request durations and counts server errors', () => {
    logRequest('/health', 'GET', 200, 4);
    logRequest('/predictions', 'GET', 200, 120);
    logRequest('/predictions', 'GET', 502, 30);
    logRequest('/leagues/EPL/table', 'GET', 500, 700);

    const metrics = getMetrics();

    expect(metrics.responseTimes).toMatchObject({
      under10ms: 1,
      under50ms: 1,
      under500ms: 1,
      over500ms: 1,
      p50Bucket: '<50ms',
    });
    expect(metrics.requests).toEqual({ total: 4, errors: 2, errorRate: '50.00%' });
  });

  it('counts source calls and failures', () => {
    logSourceCall('/getLeagueData/EPL/2025', true, 120);
    logSourceCall('/getLeagueData/EPL/2025', false, 15000, 'timeout');

    expect(getMetrics().cache).toMatchObject({ sourceCalls: 2, sourceFailures: 1 });
  });

  it('drops events below the configured level', () => {
    configureLogging({ level: 'warn' });

    logEvent('ignored', {}, 'info');
    logEvent('kept', { reason: 'test' }, 'warn');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.warn).mock.calls[0][0]).toBe('⚠️ [kept]');
  });

  it('writes info lines to stderr when stdout is reserved', () => {
    configureLogging({ stderrOnly: true });

    logEvent('mcp_ready');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
