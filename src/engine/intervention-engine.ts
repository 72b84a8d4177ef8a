/**
 * InterventionEngine — the decision pipeline.
 *
 *   context → TimingGate → StrategySelector → RecommendationGenerator → history
 *
 * One decision per user runs at a time; decisions for different users run
 * concurrently. Outcomes come back through recordOutcome(), which amends the
 * record and feeds the FeedbackAdapter.
 */

import { homedir } from 'os';
import { join } from 'path';
import { nanoid } from 'nanoid';
import { OutcomeConflictError, RecordNotFoundError } from '../core/errors.js';
import { KeyedMutex } from '../core/mutex.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { defaultConfig, type CadenceConfig } from '../core/types.js';
import { normalize } from '../context/context-model.js';
import { parseContextPayload } from '../context/schema.js';
import type { NormalizedContext, UserContext } from '../context/types.js';
import { FeedbackAdapter, outcomeEffectiveness } from '../feedback/feedback-adapter.js';
import { summarizeLearning, type LearningSummary } from '../feedback/learning-summary.js';
import { InMemoryHistoryStore } from '../history/memory-store.js';
import { openDatabase, SQLiteHistoryStore, SQLiteWeightStore } from '../history/sqlite-store.js';
import { snapshotContext } from '../history/snapshot.js';
import type { InterventionHistoryStore, InterventionOutcome } from '../history/types.js';
import { RecommendationGenerator } from '../recommendation/recommendation-generator.js';
import type { Rng } from '../recommendation/rng.js';
import type { Intervention, TemplateProvider } from '../recommendation/types.js';
import { getDefaultProfiles, type PersonalityProfileProvider } from '../selection/personality.js';
import { StrategySelector } from '../selection/strategy-selector.js';
import { createDefaultCatalog } from '../strategies/builtin.js';
import type { StrategyCatalog } from '../strategies/catalog.js';
import type { WeightStore } from '../strategies/types.js';
import { TimingGate } from '../timing/timing-gate.js';
import type { DeferralReason } from '../timing/types.js';
import { MINUTE_MS } from '../utils/math.js';
import { retry, TimeoutError, withTimeout } from '../utils/retry.js';
import type { DeliveryChannel, SignalProvider } from './ports.js';
import type { DecisionWithContext, EngineDecision, OutcomeResult } from './types.js';

export interface InterventionEngineOptions {
  config?: CadenceConfig;
  catalog?: StrategyCatalog;
  /** Defaults to the store named by `config.storage`. */
  history?: InterventionHistoryStore;
  weightStore?: WeightStore;
  profiles?: PersonalityProfileProvider;
  templates?: TemplateProvider;
  rng?: Rng;
  signals?: SignalProvider;
  delivery?: DeliveryChannel;
  /** Retries after the first failed delivery attempt. */
  deliveryRetries?: number;
  events?: EventBus;
  clock?: () => number;
  generateId?: () => string;
}

export function defaultDbPath(): string {
  return join(homedir(), '.cadence', 'cadence.db');
}

export class InterventionEngine {
  readonly events: EventBus;

  private config: CadenceConfig;
  private catalog: StrategyCatalog;
  private history: InterventionHistoryStore;
  private weightStore?: WeightStore;
  private gate: TimingGate;
  private selector: StrategySelector;
  private generator: RecommendationGenerator;
  private feedback: FeedbackAdapter;
  private signals?: SignalProvider;
  private delivery?: DeliveryChannel;
  private deliveryRetries: number;
  private clock: () => number;
  private generateId: () => string;
  private userLocks = new KeyedMutex<string>();
  private recordLocks = new KeyedMutex<string>();
  private pendingDeliveries: Set<Promise<void>> = new Set();
  private initialized = false;

  constructor(options: InterventionEngineOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.events = options.events ?? new EventBus();
    this.catalog = options.catalog ?? createDefaultCatalog();
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? (() => nanoid());
    this.signals = options.signals;
    this.delivery = options.delivery;
    this.deliveryRetries = Math.max(0, options.deliveryRetries ?? 2);

    if (options.history) {
      this.history = options.history;
      this.weightStore = options.weightStore;
    } else if (this.config.storage.driver === 'sqlite') {
      const db = openDatabase(this.config.storage.dbPath ?? defaultDbPath());
      this.history = new SQLiteHistoryStore(db);
      this.weightStore = options.weightStore ?? new SQLiteWeightStore(db);
    } else {
      this.history = new InMemoryHistoryStore();
      this.weightStore = options.weightStore;
    }

    const { timing, selection, recommendation, feedback } = this.config;
    const profiles = options.profiles ?? getDefaultProfiles();

    this.gate = new TimingGate({
      highLoadThreshold: timing.highLoadThreshold,
      minSpacingMs: timing.minSpacingMinutes * MINUTE_MS,
      dailyCap: timing.dailyCap,
      quietHours: timing.quietHours,
      dismissalBackoff: timing.dismissals.enabled
        ? {
            window: timing.dismissals.window,
            threshold: timing.dismissals.threshold,
            minEffectiveness: timing.dismissals.minEffectiveness,
            lookbackMs: timing.dismissals.lookbackMinutes * MINUTE_MS,
          }
        : undefined,
    });

    this.selector = new StrategySelector(this.catalog, {
      weights: selection.weights,
      recencyWindow: selection.recencyWindow,
      profiles,
      onExcluded: (exclusion, context) => {
        this.events.emit('strategy:excluded', { userId: context.userId, exclusion });
      },
    });

    this.generator = new RecommendationGenerator({
      templates: options.templates,
      profiles,
      rng: options.rng,
      seed: recommendation.seed,
      highStressThreshold: recommendation.highStressThreshold,
    });

    this.feedback = new FeedbackAdapter(this.catalog, {
      alpha: feedback.alpha,
      weightStore: this.weightStore,
    });
  }

  static async create(options: InterventionEngineOptions = {}): Promise<InterventionEngine> {
    const engine = new InterventionEngine(options);
    await engine.initialize();
    return engine;
  }

  /**
   * Load persisted strategy weights. Safe to call more than once.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.weightStore) {
      const unknown = await this.catalog.loadWeights(this.weightStore);
      if (unknown.length > 0) {
        getLogger().warn({ strategies: unknown }, 'Ignoring persisted weights for unknown strategies');
      }
    }

    this.initialized = true;
    getLogger().debug(
      { strategies: this.catalog.size, storage: this.config.storage.driver },
      'InterventionEngine initialized',
    );
  }

  // ─── Decisions ────────────────────────────────────────────

  /**
   * Decide whether to intervene for this context and, if so, with what.
   */
  async decide(context: UserContext): Promise<EngineDecision> {
    return this.userLocks.withLock(context.userId, () => this.decideLocked(context));
  }

  /**
   * Validate and normalize an untrusted payload, then decide.
   * Throws ContextValidationError when the payload has no usable userId.
   */
  async decidePayload(payload: unknown): Promise<DecisionWithContext> {
    const normalized = parseContextPayload(payload, {
      now: this.clock(),
      maxRecentInteractions: this.config.context.maxRecentInteractions,
    });
    const decision = await this.decide(normalized.context);
    return { decision, normalized };
  }

  /**
   * Pull signals for a user from the configured SignalProvider and decide.
   * A slow or failing provider degrades to default context values.
   */
  async decideForUser(userId: string): Promise<DecisionWithContext> {
    const normalized = await this.fetchContext(userId);
    const decision = await this.decide(normalized.context);
    return { decision, normalized };
  }

  private decideLocked(context: UserContext): EngineDecision {
    const now = this.clock();
    const logger = getLogger();

    const gate = this.gate.evaluate(context, this.history, now);
    if (!gate.allowed) {
      return this.defer(context.userId, gate.reason, gate.detail, now);
    }

    const selection = this.selector.select(context, this.history, now);
    if (selection.kind === 'noop') {
      const detail =
        selection.reason === 'cooldown_active'
          ? 'every applicable strategy is cooling down'
          : 'no strategy applies to the current context';
      return this.defer(context.userId, selection.reason, detail, now);
    }

    const { strategy, score, breakdown } = selection;
    const intervention = this.generator.build(strategy, context, now);

    const record = this.history.record(
      {
        id: this.generateId(),
        userId: context.userId,
        strategyName: strategy.name,
        timestamp: now,
        contextSnapshot: snapshotContext(context),
      },
      strategy.cooldownMs,
    );

    logger.info(
      { userId: context.userId, recordId: record.id, strategy: strategy.name, score, fallback: intervention.fallback },
      'Intervention selected',
    );
    this.events.emit('intervention:recorded', { record, intervention, score });

    if (this.delivery) {
      this.dispatch(this.delivery, context.userId, record.id, intervention);
    }

    return {
      deferred: false,
      recordId: record.id,
      selectedStrategy: strategy.name,
      score,
      breakdown,
      intervention,
      timing: { followUpAt: intervention.followUpAt },
    };
  }

  private defer(userId: string, reason: DeferralReason, detail: string, now: number): EngineDecision {
    getLogger().debug({ userId, reason, detail }, 'Intervention deferred');
    this.events.emit('decision:deferred', { userId, reason, detail, timestamp: now });
    return { deferred: true, reason, detail };
  }

  private async fetchContext(userId: string): Promise<NormalizedContext> {
    const options = {
      now: this.clock(),
      maxRecentInteractions: this.config.context.maxRecentInteractions,
    };
    if (!this.signals) {
      return normalize({ userId }, options);
    }

    const timeoutMs = this.config.context.signalTimeoutMs;
    try {
      const raw = await withTimeout(
        this.signals.getRawSignals(userId),
        timeoutMs,
        `Signal provider timed out after ${timeoutMs}ms`,
      );
      return normalize({ ...raw, userId }, options);
    } catch (err) {
      getLogger().warn(
        { userId, timedOut: err instanceof TimeoutError, error: err instanceof Error ? err.message : String(err) },
        'Signal provider failed; using default context',
      );
      return normalize({ userId }, options);
    }
  }

  // ─── Delivery ─────────────────────────────────────────────

  private dispatch(channel: DeliveryChannel, userId: string, recordId: string, intervention: Intervention): void {
    const pending = this.deliver(channel, userId, recordId, intervention).finally(() => {
      this.pendingDeliveries.delete(pending);
    });
    this.pendingDeliveries.add(pending);
  }

  private async deliver(
    channel: DeliveryChannel,
    userId: string,
    recordId: string,
    intervention: Intervention,
  ): Promise<void> {
    const logger = getLogger();
    try {
      const ack = await retry(() => channel.deliver(userId, intervention), {
        retries: this.deliveryRetries,
        onRetry: (attempt, error, delayMs) =>
          logger.warn({ userId, recordId, attempt, delayMs, error: error.message }, 'Retrying intervention delivery'),
      });
      if (!ack.accepted) {
        logger.warn({ userId, recordId, channel: ack.channel }, 'Delivery channel declined intervention');
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ userId, recordId, error: message }, 'Intervention delivery failed');
      this.events.emit('delivery:failed', { userId, recordId, error: message });
    }
  }

  /** Resolves once every in-flight delivery has settled. */
  async flushDeliveries(): Promise<void> {
    while (this.pendingDeliveries.size > 0) {
      await Promise.all(this.pendingDeliveries);
    }
  }

  // ─── Feedback ─────────────────────────────────────────────

  /**
   * Attach an observed outcome to a delivered intervention and fold it into
   * the strategy's weight.
   *
   * The weight moves first and the outcome is attached only after that
   * succeeds, so a failed weight write leaves the record open for a retry.
   */
  async recordOutcome(recordId: string, outcome: InterventionOutcome): Promise<OutcomeResult> {
    return this.recordLocks.withLock(recordId, async () => {
      const existing = this.history.get(recordId);
      if (!existing) {
        throw new RecordNotFoundError(recordId);
      }
      if (existing.outcome) {
        throw new OutcomeConflictError(recordId);
      }

      const effectiveness =
        this.config.feedback.signal === 'blended' ? outcomeEffectiveness(outcome) : outcome.effectiveness;
      const weight = await this.feedback.applyFeedback(existing.strategyName, effectiveness);
      const record = this.history.attachOutcome(recordId, outcome);

      this.events.emit('feedback:applied', { recordId, strategyName: record.strategyName, effectiveness, weight });
      return { record, weight };
    });
  }

  /** Acceptance and effectiveness so far, overall, per strategy and per personality type. */
  getLearningSummary(): LearningSummary {
    return summarizeLearning(this.history.list(), this.catalog.weights());
  }

  // ─── Accessors ────────────────────────────────────────────

  getCatalog(): StrategyCatalog {
    return this.catalog;
  }

  getHistory(): InterventionHistoryStore {
    return this.history;
  }

  getConfig(): CadenceConfig {
    return this.config;
  }

  async shutdown(): Promise<void> {
    await this.flushDeliveries();
    this.history.close?.();
  }
}
