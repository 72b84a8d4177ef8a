export class CadenceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CadenceError';
  }
}

export class ConfigError extends CadenceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ContextValidationError extends CadenceError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_CONTEXT', 'normalize');
    this.name = 'ContextValidationError';
  }
}

/**
 * Raised when feedback or a lookup names a strategy the catalog does not know.
 * Points at an id mismatch upstream, so callers must not ignore it.
 */
export class StrategyNotFoundError extends CadenceError {
  constructor(public readonly strategyName: string) {
    super(`Unknown strategy: ${strategyName}`, 'STRATEGY_NOT_FOUND', 'feedback');
    this.name = 'StrategyNotFoundError';
  }
}

export class RuleEvaluationError extends CadenceError {
  constructor(message: string, public readonly strategyName?: string) {
    super(message, 'RULE_EVALUATION_ERROR', 'select');
    this.name = 'RuleEvaluationError';
  }
}

export class RecordNotFoundError extends CadenceError {
  constructor(public readonly recordId: string) {
    super(`Unknown intervention record: ${recordId}`, 'RECORD_NOT_FOUND', 'history');
    this.name = 'RecordNotFoundError';
  }
}

export class OutcomeConflictError extends CadenceError {
  constructor(public readonly recordId: string) {
    super(`Outcome already attached to record ${recordId}`, 'OUTCOME_CONFLICT', 'history');
    this.name = 'OutcomeConflictError';
  }
}

export class CooldownViolationError extends CadenceError {
  constructor(
    public readonly userId: string,
    public readonly strategyName: string,
    public readonly remainingMs: number,
  ) {
    super(
      `Strategy "${strategyName}" is cooling down for user ${userId} (${Math.ceil(remainingMs / 1000)}s left)`,
      'COOLDOWN_VIOLATION',
      'history',
    );
    this.name = 'CooldownViolationError';
  }
}
