/**
 * Conversion Metrics
 *
 * Prometheus text-format metrics for the conversion endpoint, served on
 * GET /metrics by the API itself.
 *
 * Metrics:
 * - conversions_total (counter, by outcome)
 * - conversion_duration_seconds (histogram, converter wall-clock time)
 * - conversions_in_flight (gauge)
 */

import { Router } from 'express';
import type { ConversionOutcome } from '@mdocx/shared';

// ── Histogram bucket boundaries for converter duration (seconds) ────

const CONVERSION_DURATION_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 20, 30];

// ── Internal metric state ───────────────────────────────────────────

interface HistogramState {
  bucketCounts: number[]; // one count per bucket boundary
  sum: number;
  count: number;
}

function emptyOutcomeCounts(): Record<ConversionOutcome, number> {
  return { success: 0, failed: 0, timeout: 0, output_missing: 0, internal_error: 0 };
}

function emptyHistogram(): HistogramState {
  return {
    bucketCounts: new Array<number>(CONVERSION_DURATION_BUCKETS.length).fill(0),
    sum: 0,
    count: 0,
  };
}

const metrics = {
  conversionsTotal: emptyOutcomeCounts(),
  inFlight: 0,
  conversionDuration: emptyHistogram(),
};

// ── Public API for recording metrics ────────────────────────────────

export function incConversionsTotal(outcome: ConversionOutcome): void {
  metrics.conversionsTotal[outcome] += 1;
}

/**
 * Record one converter run for the histogram.
 * @param durationSeconds - time from spawn to exit (or kill)
 */
export function observeConversionDuration(durationSeconds: number): void {
  metrics.conversionDuration.sum += durationSeconds;
  metrics.conversionDuration.count += 1;

  CONVERSION_DURATION_BUCKETS.forEach((boundary, i) => {
    if (durationSeconds <= boundary) {
      metrics.conversionDuration.bucketCounts[i] = (metrics.conversionDuration.bucketCounts[i] ?? 0) + 1;
    }
  });
}

export function incInFlight(): void {
  metrics.inFlight += 1;
}

export function decInFlight(): void {
  metrics.inFlight = Math.max(0, metrics.inFlight - 1);
}

// ── Prometheus text format serialization ────────────────────────────

export function serializeMetrics(): string {
  const lines: string[] = [];

  lines.push('# HELP conversions_total Total number of conversion requests by outcome');
  lines.push('# TYPE conversions_total counter');
  for (const [outcome, count] of Object.entries(metrics.conversionsTotal)) {
    lines.push(`conversions_total{outcome="${outcome}"} ${count}`);
  }

  // Already cumulative: an observation increments every boundary it fits under.
  lines.push('# HELP conversion_duration_seconds Duration of converter runs in seconds');
  lines.push('# TYPE conversion_duration_seconds histogram');
  CONVERSION_DURATION_BUCKETS.forEach((boundary, i) => {
    lines.push(
      `conversion_duration_seconds_bucket{le="${boundary}"} ${metrics.conversionDuration.bucketCounts[i] ?? 0}`,
    );
  });
  lines.push(`conversion_duration_seconds_bucket{le="+Inf"} ${metrics.conversionDuration.count}`);
  lines.push(`conversion_duration_seconds_sum ${metrics.conversionDuration.sum}`);
  lines.push(`conversion_duration_seconds_count ${metrics.conversionDuration.count}`);

  lines.push('# HELP conversions_in_flight Conversions currently running');
  lines.push('# TYPE conversions_in_flight gauge');
  lines.push(`conversions_in_flight ${metrics.inFlight}`);

  return lines.join('\n') + '\n';
}

/**
 * Reset all metrics to initial state.
 * Used in tests.
 */
export function resetMetrics(): void {
  metrics.conversionsTotal = emptyOutcomeCounts();
  metrics.inFlight = 0;
  metrics.conversionDuration = emptyHistogram();
}

export const metricsRouter = Router();

metricsRouter.get('/', (_req, res) => {
  res.type('text/plain; version=0.0.4; charset=utf-8').send(serializeMetrics());
});
