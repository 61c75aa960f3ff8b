/**
 * Shared HTTP-facing type definitions.
 *
 * Registry domain types live in `types/registry.ts`; the canonical Avro
 * structure in `types/avro.ts`.
 */

/** Health status for an individual backing service */
export interface ServiceHealth {
  status: 'healthy' | 'degraded' | 'unreachable';
  latency_ms?: number;
  error?: string;
}

/** Aggregated health response */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime_seconds: number;
  storage: 'memory' | 'postgres';
  services: Record<string, ServiceHealth>;
  timestamp: string;
}

/** Error response shape */
export interface ErrorResponse {
  error: string;
  message: string;
  request_id?: string;
}
