import type { GatewayEvent, ObservabilitySink } from './types';
import type { Metrics } from '../util/metrics';
import { logError, logInfo, logWarn } from '../util/logger';

/** Writes one structured log line per terminal outcome. Prompt text never appears. */
export function createLogSink(): ObservabilitySink {
  return {
    record(event) {
      switch (event.outcome) {
        case 'success':
          logInfo('gateway_complete', { ...event });
          return;
        case 'exhausted':
          logError('gateway_exhausted', { ...event });
          return;
        case 'cancelled':
          logWarn('gateway_cancelled', { ...event });
          return;
      }
    },
  };
}

export function createMetricsSink(metrics: Metrics): ObservabilitySink {
  return {
    record(event) {
      metrics.incCounter('gateway_requests_total', {
        purpose: event.purpose,
        outcome: event.outcome,
      });
      if (event.outcome === 'success' && event.usedFallback) {
        metrics.incCounter('gateway_fallbacks_total', {
          purpose: event.purpose,
          provider: event.provider,
        });
      }
    },
  };
}

export function combineSinks(...sinks: ObservabilitySink[]): ObservabilitySink {
  return {
    record(event) {
      for (const sink of sinks) {
        sink.record(event);
      }
    },
  };
}

/** A failing sink must not change what the caller receives. */
export function emitEvent(sink: ObservabilitySink | undefined, event: GatewayEvent): void {
  if (!sink) return;
  try {
    sink.record(event);
  } catch (error) {
    logError('observability_sink_failed', {
      outcome: event.outcome,
      purpose: event.purpose,
      error: error instanceof Error ? error.message : 'unknown',
    });
  }
}
