/**
 * REST API Server — Types
 *
 * Request/response types for the Cadence HTTP API.
 */

import type { StrategyKind } from '../strategies/types.js';

// ─── API Server Config ──────────────────────────────────────

export interface APIServerConfig {
  port: number;
  /** Defaults to 127.0.0.1. */
  host?: string;
  apiKey?: string;
  corsOrigins?: string[];
  /** Request bodies larger than this are rejected with 413. */
  maxBodyBytes?: number;
}

// ─── Feedback ───────────────────────────────────────────────

export interface FeedbackResponse {
  recordId: string;
  strategyName: string;
  weight: number;
}

// ─── Strategies ─────────────────────────────────────────────

export interface StrategySummary {
  name: string;
  kind: StrategyKind;
  cognitiveCost: number;
  cooldownMinutes: number;
  weight: number;
  applicability: string;
}

// ─── Health & Status ────────────────────────────────────────

export interface HealthResponse {
  status: 'ok';
  version: string;
  uptime: number;
  strategies: number;
  records: number;
  decisions: { delivered: number; deferred: number };
}

// ─── API Error ──────────────────────────────────────────────

export interface APIError {
  error: string;
  code: string;
  details?: string[];
}
