/**
 * Health report for the storage, embedding and language model dependencies
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ServiceHealth {
  status: HealthStatus;
  /** Wall time of the check in milliseconds */
  latency_ms: number;
  error?: string;
}

export interface DatabaseHealth extends ServiceHealth {
  path: string;
  /** Reported by vec_version(); null when the check failed */
  sqlite_vec_version: string | null;
  documents: number | null;
}

export interface EmbeddingHealth extends ServiceHealth {
  provider: string;
  model: string;
  dimension: number;
}

export interface LanguageModelHealth extends ServiceHealth {
  provider: string;
  model: string;
}

export interface HealthReport {
  /** healthy when every service is; unhealthy when any is; degraded otherwise */
  status: HealthStatus;
  checked_at: string;
  services: {
    database: DatabaseHealth;
    embedding: EmbeddingHealth;
    llm: LanguageModelHealth;
  };
}

export function overallStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.every((status) => status === 'healthy')) return 'healthy';
  if (statuses.some((status) => status === 'unhealthy')) return 'unhealthy';
  return 'degraded';
}
