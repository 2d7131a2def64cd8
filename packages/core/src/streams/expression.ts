import { isMatch } from 'super-regex';
import {
  NUMERIC_FIELDS,
  STRING_FIELDS,
  STRING_LIST_FIELDS,
} from '../schemas.js';
import type {
  Candidate,
  FieldPredicate,
  NumberListField,
  NumericField,
  Predicate,
  SortKey,
  StringField,
  StringListField,
} from '../schemas.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('expression');

// Upper bound for a single pattern test, in milliseconds.
const PATTERN_TIMEOUT = 100;

const numericFields = new Set<string>(NUMERIC_FIELDS);
const stringFields = new Set<string>(STRING_FIELDS);
const stringListFields = new Set<string>(STRING_LIST_FIELDS);

type PredicateOn<F> = Extract<FieldPredicate, { field: F }>;

const isNumericPredicate = (p: FieldPredicate): p is PredicateOn<NumericField> =>
  numericFields.has(p.field);
const isStringPredicate = (p: FieldPredicate): p is PredicateOn<StringField> =>
  stringFields.has(p.field);
const isStringListPredicate = (
  p: FieldPredicate
): p is PredicateOn<StringListField> => stringListFields.has(p.field);

export const isNumericField = (field: string): field is NumericField =>
  numericFields.has(field);
export const isStringListField = (field: string): field is StringListField =>
  stringListFields.has(field);

export function numericValue(candidate: Candidate, field: NumericField): number {
  return field === 'versionCount'
    ? candidate.versions.length
    : candidate[field];
}

export function stringValue(candidate: Candidate, field: StringField): string {
  return field === 'kind' ? (candidate.kind ?? '') : candidate[field];
}

export function stringListValue(
  candidate: Candidate,
  field: StringListField
): readonly string[] {
  return candidate[field];
}

export function numberListValue(
  candidate: Candidate,
  field: NumberListField
): readonly number[] {
  return candidate[field];
}

const compiledPatterns = new Map<string, RegExp>();

function compilePattern(pattern: string, flags = ''): RegExp {
  const key = `${flags}/${pattern}`;
  let regex = compiledPatterns.get(key);
  if (!regex) {
    regex = new RegExp(pattern, flags);
    compiledPatterns.set(key, regex);
  }
  return regex;
}

/**
 * Tests a pattern with a time limit. A test that runs out of time counts as
 * no match.
 */
export function testPattern(
  pattern: string,
  flags: string | undefined,
  text: string
): boolean {
  const start = Date.now();
  const matched = isMatch(compilePattern(pattern, flags), text, {
    timeout: PATTERN_TIMEOUT,
  });
  if (!matched && Date.now() - start >= PATTERN_TIMEOUT) {
    logger.warn(`Pattern /${pattern}/ timed out`, { text });
  }
  return matched;
}

function evaluateFieldPredicate(p: FieldPredicate, candidate: Candidate): boolean {
  if (isNumericPredicate(p)) {
    const value = numericValue(candidate, p.field);
    switch (p.op) {
      case 'eq':
        return value === p.value;
      case 'neq':
        return value !== p.value;
      case 'gt':
        return value > p.value;
      case 'gte':
        return value >= p.value;
      case 'lt':
        return value < p.value;
      case 'lte':
        return value <= p.value;
      case 'in':
        return p.values.includes(value);
      case 'notIn':
        return !p.values.includes(value);
    }
  }

  if (isStringPredicate(p)) {
    const value = stringValue(candidate, p.field);
    switch (p.op) {
      case 'eq':
        return value === p.value;
      case 'neq':
        return value !== p.value;
      case 'in':
        return p.values.includes(value);
      case 'notIn':
        return !p.values.includes(value);
      case 'matches':
        return testPattern(p.pattern, p.flags, value);
      case 'notMatches':
        return !testPattern(p.pattern, p.flags, value);
    }
  }

  if (isStringListPredicate(p)) {
    const included = stringListValue(candidate, p.field).includes(p.value);
    return p.op === 'includes' ? included : !included;
  }

  const included = numberListValue(candidate, p.field).includes(p.value);
  return p.op === 'includes' ? included : !included;
}

/**
 * Evaluates a predicate against a candidate. Candidates are only read.
 */
export function evaluatePredicate(
  predicate: Predicate,
  candidate: Candidate
): boolean {
  if ('all' in predicate) {
    return predicate.all.every((p) => evaluatePredicate(p, candidate));
  }
  if ('any' in predicate) {
    return predicate.any.some((p) => evaluatePredicate(p, candidate));
  }
  if ('not' in predicate) {
    return !evaluatePredicate(predicate.not, candidate);
  }
  return evaluateFieldPredicate(predicate, candidate);
}

// An earlier listed value scores higher; unlisted values score 0.
function preferenceScore(values: readonly string[], value: string): number {
  const index = values.indexOf(value);
  return index === -1 ? 0 : values.length - index;
}

/**
 * Computes the numeric sort key of a candidate. Higher keys sort first.
 */
export function sortKeyValue(key: SortKey, candidate: Candidate): number {
  switch (key.type) {
    case 'field': {
      const field = key.field;
      const value = isNumericField(field)
        ? numericValue(candidate, field)
        : isStringListField(field)
          ? stringListValue(candidate, field).length
          : numberListValue(candidate, field).length;
      return key.invert ? -value : value;
    }
    case 'match':
      return evaluatePredicate(key.when, candidate) ? 1 : 0;
    case 'preference': {
      const field = key.field;
      if (isStringListField(field)) {
        return Math.max(
          0,
          ...stringListValue(candidate, field).map((value) =>
            preferenceScore(key.values, value)
          )
        );
      }
      return preferenceScore(key.values, stringValue(candidate, field));
    }
  }
}
