import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface BridgeMetrics {
  register: Registry;
  trendRequests: Counter<'range' | 'result'>;
  trendDuration: Histogram<'range'>;
  trendPages: Counter<string>;
  trendRecordsSkipped: Counter<'reason'>;
  pointReads: Counter<'point' | 'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): BridgeMetrics => {
  const register = new Registry();

  const trendRequests = new Counter({
    name: 'thermobridge_trend_requests_total',
    help: 'Trend requests served, by range and result code',
    registers: [register],
    labelNames: ['range', 'result'] as const
  });

  const trendDuration = new Histogram({
    name: 'thermobridge_trend_duration_seconds',
    help: 'Time spent fetching and processing a trend log',
    registers: [register],
    labelNames: ['range'] as const,
    buckets: [0.25, 0.5, 1, 2.5, 5, 10, 30, 60]
  });

  const trendPages = new Counter({
    name: 'thermobridge_trend_pages_total',
    help: 'Log-buffer pages fetched from the gateway',
    registers: [register]
  });

  const trendRecordsSkipped = new Counter({
    name: 'thermobridge_trend_records_skipped_total',
    help: 'Trend log records dropped during extraction, by reason',
    registers: [register],
    labelNames: ['reason'] as const
  });

  const pointReads = new Counter({
    name: 'thermobridge_point_reads_total',
    help: 'Present-value reads, by point and outcome',
    registers: [register],
    labelNames: ['point', 'outcome'] as const
  });

  const readinessGauge = new Gauge({
    name: 'thermobridge_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    trendRequests,
    trendDuration,
    trendPages,
    trendRecordsSkipped,
    pointReads,
    readinessGauge
  };
};
