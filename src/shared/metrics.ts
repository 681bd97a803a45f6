/**
 * STL Relay: Metrics Collector
 *
 * In-memory counters for served connections and relayed requests, dumped to
 * the log at shutdown. No persistence.
 */

// =============================================================================
// Types
// =============================================================================

/** How a connection's request sequence ended. */
export type ConnectionOutcome = 'completed' | 'framing' | 'timeout' | 'error' | 'shutdown';

export interface ConnectionMetrics {
  connections: number;
  /** Payloads handed to the relay across all connections */
  requests: number;
  totalMs: number;
  outcomes: Record<ConnectionOutcome, number>;
}

export interface RequestMetrics {
  handled: number;
  failed: number;
  totalMs: number;
  slowestMs: number;
}

export interface RelayMetrics {
  connections: ConnectionMetrics;
  requests: RequestMetrics;
}

// =============================================================================
// Internal Store
// =============================================================================

function emptyMetrics(): RelayMetrics {
  return {
    connections: {
      connections: 0,
      requests: 0,
      totalMs: 0,
      outcomes: { completed: 0, framing: 0, timeout: 0, error: 0, shutdown: 0 },
    },
    requests: { handled: 0, failed: 0, totalMs: 0, slowestMs: 0 },
  };
}

let store: RelayMetrics = emptyMetrics();

// =============================================================================
// Public API
// =============================================================================

/** One connection released by the Channel Server. */
export function recordConnection(outcome: ConnectionOutcome, requests: number, durationMs: number): void {
  const stats = store.connections;
  stats.connections += 1;
  stats.requests += requests;
  stats.totalMs += durationMs;
  stats.outcomes[outcome] += 1;
}

/** One request taken through decode, convert and respond. */
export function recordRequest(durationMs: number, ok: boolean): void {
  const stats = store.requests;
  if (ok) stats.handled += 1;
  else stats.failed += 1;
  stats.totalMs += durationMs;
  stats.slowestMs = Math.max(stats.slowestMs, durationMs);
}

/** A copy of the counters; mutating it leaves the store alone. */
export function getMetrics(): RelayMetrics {
  return structuredClone(store);
}

export function resetMetrics(): void {
  store = emptyMetrics();
}
