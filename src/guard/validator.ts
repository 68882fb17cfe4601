/**
 * QueryGate - Policy Validator
 *
 * Applies the ordered rule set to a CandidateStatement. Pure: no I/O, no
 * exceptions, every statement maps to a verdict.
 */

import { DEFAULT_RULES, type PolicyRule, type RuleContext } from './rules.js';
import type { CandidateStatement, ValidationVerdict } from './types.js';

const ACCEPTED: ValidationVerdict = Object.freeze({
  accepted: true,
  reason: 'ok',
  matchedRule: null,
  message: 'query accepted',
});

/**
 * Evaluate rules in order; the first failing rule wins.
 */
export function validateStatement(
  statement: CandidateStatement,
  context: RuleContext,
  rules: readonly PolicyRule[] = DEFAULT_RULES
): ValidationVerdict {
  for (const rule of rules) {
    const violation = rule.check(statement, context);
    if (violation !== null) {
      return Object.freeze({
        accepted: false,
        reason: rule.reason,
        matchedRule: rule.name,
        message: `query rejected: ${violation}`,
      });
    }
  }

  return ACCEPTED;
}

// =============================================================================
// Policy Validator Class
// =============================================================================

export class PolicyValidator {
  private readonly context: RuleContext;
  private readonly rules: readonly PolicyRule[];

  constructor(context: RuleContext, rules: readonly PolicyRule[] = DEFAULT_RULES) {
    this.context = context;
    this.rules = rules;
  }

  validate(statement: CandidateStatement): ValidationVerdict {
    return validateStatement(statement, this.context, this.rules);
  }

  getRuleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }
}
