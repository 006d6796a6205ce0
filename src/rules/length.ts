import type { Commit } from '../commit.js';
import type { Rule } from '../types.js';
import { ConfigError } from '../errors.js';
import { createIssue } from '../issues.js';

type Part = 'subject' | 'body';

function partOf(c: Commit, part: Part) {
  return part === 'subject' ? c.subject() : c.body();
}

// code points, so an emoji counts once
function lengthOf(s: string) {
  return [...s].length;
}

function checkLimit(name: string, n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name}: length must be a non-negative integer, got ${n}`);
  }
}

function maxLengthRule(part: Part, max: number): Rule {
  const name = `${part}-max-length`;
  checkLimit(name, max);
  return {
    name,
    check(c) {
      if (lengthOf(partOf(c, part)) <= max) return undefined;
      return createIssue(`${part} length exceeds max [${max}]`, c);
    },
  };
}

function minLengthRule(part: Part, min: number): Rule {
  const name = `${part}-min-length`;
  checkLimit(name, min);
  return {
    name,
    check(c) {
      if (lengthOf(partOf(c, part)) >= min) return undefined;
      return createIssue(`${part} length less than min [${min}]`, c);
    },
  };
}

export const subjectMaxLengthRule = (max: number) => maxLengthRule('subject', max);
export const subjectMinLengthRule = (min: number) => minLengthRule('subject', min);
export const bodyMaxLengthRule = (max: number) => maxLengthRule('body', max);
export const bodyMinLengthRule = (min: number) => minLengthRule('body', min);
