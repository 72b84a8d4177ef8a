/**
 * Cadence REST API Server
 *
 * Thin HTTP surface over an InterventionEngine. Uses Node.js built-in http
 * module; request bodies are validated with zod before they reach the engine.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import { z } from 'zod';
import {
  CadenceError,
  ContextValidationError,
  OutcomeConflictError,
  RecordNotFoundError,
  StrategyNotFoundError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { camelizeKeys } from '../context/schema.js';
import type { InterventionEngine } from '../engine/intervention-engine.js';
import { OutcomeSchema } from '../history/schema.js';
import { describeRule } from '../strategies/rules.js';
import { MINUTE_MS } from '../utils/math.js';
import { VERSION } from '../version.js';
import { createAuthMiddleware, createCorsMiddleware, type RequestHandler } from './auth.js';
import type { APIError, APIServerConfig, FeedbackResponse, HealthResponse, StrategySummary } from './types.js';

const FeedbackRequestSchema = z.object({
  recordId: z.string().trim().min(1),
  outcome: OutcomeSchema,
});

class PayloadTooLargeError extends Error {}

// ═══════════════════════════════════════════════════════════════
// API SERVER
// ═══════════════════════════════════════════════════════════════

export class APIServer {
  private server: Server | null = null;
  private config: Required<Omit<APIServerConfig, 'apiKey'>> & { apiKey: string };
  private startedAt: number = 0;
  private delivered = 0;
  private deferred = 0;
  private middleware: RequestHandler[] = [];

  constructor(
    private readonly engine: InterventionEngine,
    config: APIServerConfig,
  ) {
    this.config = {
      port: config.port,
      apiKey: config.apiKey ?? '',
      corsOrigins: config.corsOrigins ?? ['*'],
      host: config.host ?? '127.0.0.1',
      maxBodyBytes: config.maxBodyBytes ?? 1024 * 1024,
    };

    // Add CORS middleware
    this.middleware.push(createCorsMiddleware(this.config.corsOrigins));

    // Add auth middleware if API key configured
    if (this.config.apiKey) {
      this.middleware.push(createAuthMiddleware(this.config.apiKey));
    }
  }

  /** Start the API server; resolves with its base URL. */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.startedAt = Date.now();

      this.server = createServer((req, res) => {
        this.runMiddleware(req, res, 0, () => {
          this.handleRequest(req, res).catch((err: unknown) => {
            getLogger().error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled API error');
          });
        });
      });

      this.server.on('error', reject);

      this.server.listen(this.config.port, this.config.host, () => {
        resolve(`http://${this.config.host}:${this.getPort()}`);
      });
    });
  }

  /** Stop the API server */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
      this.server = null;
    });
  }

  /** Get server status */
  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bound port; differs from the configured one when that was 0. */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method?.toUpperCase() || 'GET';
    const path = url.pathname;

    try {
      if (path === '/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      if (path === '/stats' && method === 'GET') {
        return this.sendJSON(res, 200, this.engine.getLearningSummary());
      }

      if (path === '/strategies' && method === 'GET') {
        return this.handleListStrategies(res);
      }

      if (path === '/intervention' && method === 'POST') {
        return await this.handleIntervention(req, res);
      }

      if (path === '/feedback' && method === 'POST') {
        return await this.handleFeedback(req, res);
      }

      this.sendError(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
    } catch (err) {
      this.handleError(res, err);
    }
  }

  private handleHealth(res: ServerResponse): void {
    const response: HealthResponse = {
      status: 'ok',
      version: VERSION,
      uptime: Date.now() - this.startedAt,
      strategies: this.engine.getCatalog().size,
      records: this.engine.getHistory().size(),
      decisions: { delivered: this.delivered, deferred: this.deferred },
    };
    this.sendJSON(res, 200, response);
  }

  private handleListStrategies(res: ServerResponse): void {
    const strategies: StrategySummary[] = this.engine
      .getCatalog()
      .list()
      .map((s) => ({
        name: s.name,
        kind: s.kind,
        cognitiveCost: s.cognitiveCost,
        cooldownMinutes: s.cooldownMs / MINUTE_MS,
        weight: s.weight,
        applicability: describeRule(s.applicability),
      }));
    this.sendJSON(res, 200, { strategies });
  }

  private async handleIntervention(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readJSON(req, res);
    if (body === undefined) return;

    // Accept both `{ context: {...} }` and a bare context object
    const payload = isRecord(body) && isRecord(body.context) ? body.context : body;
    const { decision } = await this.engine.decidePayload(payload);

    if (decision.deferred) {
      this.deferred++;
    } else {
      this.delivered++;
    }
    this.sendJSON(res, 200, decision);
  }

  private async handleFeedback(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readJSON(req, res);
    if (body === undefined) return;

    // Accepts `record_id` as well as `recordId`
    const parsed = FeedbackRequestSchema.safeParse(camelizeKeys(body));
    if (!parsed.success) {
      return this.sendError(res, 400, {
        error: 'Invalid feedback body',
        code: 'INVALID_FEEDBACK',
        details: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
    }

    const { recordId, outcome } = parsed.data;
    const { record, weight } = await this.engine.recordOutcome(recordId, outcome);
    const response: FeedbackResponse = { recordId, strategyName: record.strategyName, weight };
    this.sendJSON(res, 200, response);
  }

  private handleError(res: ServerResponse, err: unknown): void {
    if (err instanceof ContextValidationError) {
      return this.sendError(res, 400, { error: err.message, code: err.code, details: err.issues });
    }
    if (err instanceof RecordNotFoundError || err instanceof StrategyNotFoundError) {
      return this.sendError(res, 404, { error: err.message, code: err.code });
    }
    if (err instanceof OutcomeConflictError) {
      return this.sendError(res, 409, { error: err.message, code: err.code });
    }

    const message = err instanceof Error ? err.message : 'Internal server error';
    getLogger().error({ error: message }, 'API request failed');
    this.sendError(res, 500, {
      error: message,
      code: err instanceof CadenceError ? err.code : 'INTERNAL_ERROR',
    });
  }

  // ─── Helpers ──────────────────────────────────────────────

  private runMiddleware(req: IncomingMessage, res: ServerResponse, index: number, done: () => void): void {
    if (index >= this.middleware.length) return done();
    this.middleware[index](req, res, () => this.runMiddleware(req, res, index + 1, done));
  }

  /**
   * Read and parse a JSON body. Sends the error response itself and returns
   * undefined when the body is unusable.
   */
  private async readJSON(req: IncomingMessage, res: ServerResponse): Promise<unknown> {
    let body: string;
    try {
      body = await this.readBody(req);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        this.sendError(res, 413, { error: err.message, code: 'PAYLOAD_TOO_LARGE' });
        return undefined;
      }
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch {
      this.sendError(res, 400, { error: 'Invalid JSON body', code: 'INVALID_JSON' });
      return undefined;
    }
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > this.config.maxBodyBytes) {
          reject(new PayloadTooLargeError(`Request body exceeds ${this.config.maxBodyBytes} bytes`));
          req.resume();
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }

  private sendError(res: ServerResponse, status: number, error: APIError): void {
    this.sendJSON(res, status, error);
  }

  private sendJSON(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
