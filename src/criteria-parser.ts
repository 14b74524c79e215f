/**
 * Deletion criteria: "30d 2.0 | 10d 0.5" means (>=30 days AND ratio >=2.0) OR (>=10 days AND ratio >=0.5)
 */

import { AppError } from './logger.js';
import type { Condition, CriteriaSet, Rule } from './types.js';

const SECONDS_PER_DAY = 86_400;

const DAYS_PER_UNIT: Record<string, number> = {
  d: 1,
  m: 30,
  y: 365,
};

const DURATION_PATTERN = /^(-?\d+)([dmy])$/i;
const RATIO_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

export class InvalidCriteriaError extends AppError {
  constructor(message: string, public readonly token?: string) {
    super(message, 'INVALID_CRITERIA', 400, token === undefined ? undefined : { token });
    this.name = 'InvalidCriteriaError';
  }
}

/**
 * Parse "30d" / "3m" / "1y" to seconds. Months are 30 days, years 365.
 */
export function parseDuration(input: string): number {
  const value = input.trim().toLowerCase();
  if (!value) {
    throw new InvalidCriteriaError('Duration string is empty', input);
  }

  const match = value.match(DURATION_PATTERN);
  if (!match) {
    throw new InvalidCriteriaError(
      `Invalid duration "${input}": use an integer followed by d (days), m (months) or y (years)`,
      input
    );
  }

  const amount = Number.parseInt(match[1], 10);
  if (amount < 0) {
    throw new InvalidCriteriaError(`Duration value must be positive: ${input}`, input);
  }

  return amount * DAYS_PER_UNIT[match[2]] * SECONDS_PER_DAY;
}

function parseCondition(token: string): Condition {
  if (DURATION_PATTERN.test(token)) {
    return { kind: 'min-seeding-duration', seconds: parseDuration(token), label: token.toLowerCase() };
  }

  if (RATIO_PATTERN.test(token)) {
    const ratio = Number.parseFloat(token);
    if (Number.isFinite(ratio)) {
      return { kind: 'min-ratio', ratio, label: String(ratio) };
    }
  }

  throw new InvalidCriteriaError(
    `Invalid criteria token "${token}": expected a duration (e.g. 30d, 3m, 1y) or a ratio (e.g. 2.0)`,
    token
  );
}

/**
 * Parse a criteria string into ordered rules.
 * Blank or missing input gives an empty set, which never matches.
 */
export function parseCriteria(input: string | undefined | null): CriteriaSet {
  if (input === undefined || input === null || input.trim() === '') {
    return { rules: [] };
  }

  const rules: Rule[] = input.split('|').map((group, index) => {
    const tokens = group.trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) {
      throw new InvalidCriteriaError(`Criteria rule ${index + 1} is empty in "${input}"`, group);
    }
    return { conditions: tokens.map(parseCondition) };
  });

  return { rules };
}

/**
 * Build a single-rule criteria string from the legacy MIN_SEEDING_DURATION / MIN_RATIO pair
 */
export function legacyCriteria(minDuration?: string, minRatio?: string): string | undefined {
  const parts = [minDuration, minRatio]
    .map(part => part?.trim())
    .filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(' ') : undefined;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / SECONDS_PER_DAY);
  const hours = Math.floor((seconds % SECONDS_PER_DAY) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0 && days === 0) parts.push(`${minutes}m`);

  return parts.length > 0 ? parts.join(' ') : '0m';
}

export function formatRule(rule: Rule): string {
  return rule.conditions.map(condition => condition.label).join(' AND ');
}

export function formatCriteria(criteria: CriteriaSet): string {
  return criteria.rules.map(formatRule).join(' | ');
}

export interface CriteriaStats {
  seedingSeconds: number;
  ratio: number;
}

export interface CriteriaEvaluation {
  matched: boolean;
  explanations: string[];
  /** Label of the first passing rule */
  matchedRule?: string;
}

function checkCondition(condition: Condition, stats: CriteriaStats): { passed: boolean; text: string } {
  if (condition.kind === 'min-seeding-duration') {
    const age = formatDuration(stats.seedingSeconds);
    const passed = stats.seedingSeconds >= condition.seconds;
    return { passed, text: `age ${age} ${passed ? '>=' : '<'} ${condition.label}` };
  }

  const passed = stats.ratio >= condition.ratio;
  return { passed, text: `ratio ${stats.ratio.toFixed(2)} ${passed ? '>=' : '<'} ${condition.label}` };
}

/**
 * A rule matches when all its conditions hold; the set matches when any rule does.
 * A rule with no conditions never matches.
 */
export function evaluateCriteria(criteria: CriteriaSet, stats: CriteriaStats): CriteriaEvaluation {
  const explanations: string[] = [];

  for (const rule of criteria.rules) {
    if (rule.conditions.length === 0) {
      explanations.push('Rule []: FAIL (no conditions)');
      continue;
    }

    const checks = rule.conditions.map(condition => checkCondition(condition, stats));
    const passed = checks.every(check => check.passed);
    const detail = checks.map(check => check.text).join(', ');
    const label = formatRule(rule);
    explanations.push(`Rule [${label}]: ${passed ? 'PASS' : 'FAIL'} (${detail})`);

    if (passed) {
      return { matched: true, explanations, matchedRule: label };
    }
  }

  return { matched: false, explanations };
}

export function matchesCriteria(criteria: CriteriaSet, stats: CriteriaStats): boolean {
  return evaluateCriteria(criteria, stats).matched;
}
