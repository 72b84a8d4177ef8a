/**
 * Evaluation of applicability rules against a context. Malformed rules throw
 * RuleEvaluationError; the selector treats that like any other predicate
 * failure and excludes the strategy.
 */

import { RuleEvaluationError } from '../core/errors.js';
import type { UserContext } from '../context/types.js';
import { hourInWindow, hourOfDay } from '../utils/math.js';
import type { ApplicabilityRule } from './types.js';

export function evaluateRule(rule: ApplicabilityRule, context: UserContext): boolean {
  switch (rule.kind) {
    case 'always':
      return true;
    case 'metric': {
      if (!Number.isFinite(rule.value)) {
        throw new RuleEvaluationError(`metric rule on ${rule.field} has a non-finite threshold`);
      }
      const actual = context[rule.field];
      return rule.op === 'gte' ? actual >= rule.value : actual <= rule.value;
    }
    case 'focus':
      return rule.states.includes(context.focusState);
    case 'goal': {
      const goals = [...context.goals].map((g) => g.toLowerCase());
      return rule.anyOf.some((keyword) => {
        const needle = keyword.toLowerCase();
        return goals.some((goal) => goal.includes(needle));
      });
    }
    case 'hours': {
      if (!isHour(rule.from) || !isHour(rule.to)) {
        throw new RuleEvaluationError(`hours rule needs integer hours in 0-23, got ${rule.from}-${rule.to}`);
      }
      return hourInWindow(hourOfDay(context.timeOfDay), rule.from, rule.to);
    }
    case 'all':
      return rule.rules.every((r) => evaluateRule(r, context));
    case 'any':
      return rule.rules.some((r) => evaluateRule(r, context));
    case 'not':
      return !evaluateRule(rule.rule, context);
    case 'custom':
      return rule.test(context);
    default: {
      const unknown: never = rule;
      throw new RuleEvaluationError(`Unknown rule kind: ${JSON.stringify(unknown)}`);
    }
  }
}

function isHour(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 23;
}

/**
 * One-line rendering for logs and the CLI.
 */
export function describeRule(rule: ApplicabilityRule): string {
  switch (rule.kind) {
    case 'always':
      return 'always';
    case 'metric':
      return `${rule.field} ${rule.op === 'gte' ? '>=' : '<='} ${rule.value}`;
    case 'focus':
      return `focus in [${rule.states.join(', ')}]`;
    case 'goal':
      return `goal mentions ${rule.anyOf.join('|')}`;
    case 'hours':
      return `hours ${rule.from}-${rule.to}`;
    case 'all':
      return rule.rules.map(describeRule).join(' and ');
    case 'any':
      return `(${rule.rules.map(describeRule).join(' or ')})`;
    case 'not':
      return `not ${describeRule(rule.rule)}`;
    case 'custom':
      return rule.description;
  }
}
