import type { Rule } from '../types.js';
import { compilePattern } from '../filters.js';
import { createIssue } from '../issues.js';

export function subjectRegexRule(pattern: string): Rule {
  const re = compilePattern(pattern);
  return {
    name: 'subject-regex',
    check(c) {
      if (re.test(c.subject())) return undefined;
      return createIssue(`subject does not match regex [${pattern}]`, c);
    },
  };
}

export function bodyRegexRule(pattern: string): Rule {
  const re = compilePattern(pattern);
  return {
    name: 'body-regex',
    check(c) {
      if (re.test(c.body())) return undefined;
      return createIssue(`body does not conform to regex [${pattern}]`, c);
    },
  };
}
