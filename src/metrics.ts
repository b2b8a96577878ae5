import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS; the HTTP histogram
 * records milliseconds to match its *_ms name.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'collections_call_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Call sessions currently registered in this process',
  registers: [register],
});

const capacityRejectionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}capacity_rejections_total`,
  help: 'Dial requests rejected by admission control',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls torn down, by teardown reason',
  labelNames: ['reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  labelNames: ['connection_status'] as const,
  buckets: [5, 10, 30, 60, 120, 180, 300],
  registers: [register],
});

const dispositionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}dispositions_total`,
  help: 'Final dispositions recorded per call',
  labelNames: ['disposition', 'connection_status'] as const,
  registers: [register],
});

const recordingOutcomesTotal = new client.Counter({
  name: `${METRICS_PREFIX}recording_outcomes_total`,
  help: 'Recording jobs by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const persistenceFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}persistence_failures_total`,
  help: 'Persistence writes that failed and were dropped',
  labelNames: ['operation'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- call lifecycle ----------

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

export function incCapacityRejection(): void {
  capacityRejectionsTotal.inc();
}

export function incRecordingOutcome(outcome: 'started' | 'start_failed' | 'completed' | 'failed'): void {
  recordingOutcomesTotal.inc({ outcome });
}

export function incPersistenceFailure(operation: string): void {
  persistenceFailuresTotal.inc({ operation });
}

/** Recorded once per call at teardown. */
export function recordCallMetrics(opts: {
  reason: string;
  connectionStatus: string | null;
  disposition: string | null;
  durationSeconds: number;
}): void {
  const connectionStatus = opts.connectionStatus ?? 'unknown';
  callCompletionsTotal.inc({ reason: opts.reason });
  callDurationSeconds.observe({ connection_status: connectionStatus }, opts.durationSeconds);
  dispositionsTotal.inc({ disposition: opts.disposition ?? 'none', connection_status: connectionStatus });
}
