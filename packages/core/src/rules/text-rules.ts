/**
 * Text Rules - the four message rules
 *
 * Each rule is a stateless check over one literal fragment. A rule returns a
 * Violation when it matches, carrying the fixed text when a safe textual fix
 * exists.
 */

import type { RuleId, SensitivePattern, Violation } from '../types.js';

// ============================================================================
// Messages
// ============================================================================

/**
 * Fixed diagnostic message per rule
 */
export const RULE_MESSAGES: Readonly<Record<RuleId, string>> = Object.freeze({
  'lowercase-start': 'log message must start with a lowercase letter',
  'english-only': 'log message must contain English text only',
  'no-special-chars': 'log message must not contain special characters (!, ?, ...) or emoji',
  'no-sensitive-data': 'log message may contain sensitive data',
});

// ============================================================================
// Patterns
// ============================================================================

/** Leading whitespace (NEL included) followed by an uppercase ASCII letter */
const UPPERCASE_START = /^([\s\u0085]*)([A-Z])/;

/** A letter from any script other than Latin */
const NON_LATIN_LETTER = /(?!\p{Script=Latin})\p{Letter}/u;

/**
 * Forbidden code points: `!`, `?`, the ellipsis character, the dingbat and
 * weather symbol block, the emoji presentation selector and the pictographic
 * blocks.
 */
const FORBIDDEN_CHARS = /[!?\u2026\u2600-\u27BF\uFE0F\u{1F300}-\u{1FAFF}]/u;
const FORBIDDEN_CHARS_GLOBAL = /[!?\u2026\u2600-\u27BF\uFE0F\u{1F300}-\u{1FAFF}]/gu;

const ASCII_ELLIPSIS = '...';

// ============================================================================
// Case Rule
// ============================================================================

/**
 * Flag a fragment whose first visible character is an uppercase ASCII letter.
 * The fix lowercases that one character and nothing else.
 */
export function checkLowercaseStart(text: string): Violation | undefined {
  const match = UPPERCASE_START.exec(text);
  if (!match) {return undefined;}

  const leading = match[1] ?? '';
  const letter = match[2] ?? '';
  return {
    ruleId: 'lowercase-start',
    text,
    fixedText: leading + letter.toLowerCase() + text.slice(leading.length + letter.length),
  };
}

// ============================================================================
// Alphabet Rule
// ============================================================================

export function containsNonLatinLetters(text: string): boolean {
  return NON_LATIN_LETTER.test(text);
}

/**
 * Flag a fragment containing a letter outside the Latin script. No fix.
 */
export function checkEnglishOnly(text: string): Violation | undefined {
  if (!containsNonLatinLetters(text)) {return undefined;}
  return { ruleId: 'english-only', text };
}

// ============================================================================
// Punctuation / Emoji Rule
// ============================================================================

export function containsSpecialCharsOrEmoji(text: string): boolean {
  return text.includes(ASCII_ELLIPSIS) || FORBIDDEN_CHARS.test(text);
}

/**
 * Remove forbidden characters and `...` runs, then collapse whitespace.
 *
 * Characters go first so that removing them can never leave a fresh `...`
 * behind; applying the function twice gives the same result.
 */
export function stripSpecialCharsAndEmoji(text: string): string {
  return text
    .replace(FORBIDDEN_CHARS_GLOBAL, '')
    .split(ASCII_ELLIPSIS)
    .join('')
    .split(/\s+/)
    .filter((word) => word !== '')
    .join(' ');
}

export function checkSpecialChars(text: string): Violation | undefined {
  if (!containsSpecialCharsOrEmoji(text)) {return undefined;}
  return {
    ruleId: 'no-special-chars',
    text,
    fixedText: stripSpecialCharsAndEmoji(text),
  };
}

// ============================================================================
// Sensitive Data Rule
// ============================================================================

export function containsSensitiveData(
  text: string,
  patterns: readonly SensitivePattern[]
): boolean {
  return patterns.some((pattern) => pattern.matcher.test(text));
}

/**
 * Replace every match of every pattern, in compiled order. Later patterns
 * see the output of earlier ones.
 */
export function redactSensitiveData(
  text: string,
  patterns: readonly SensitivePattern[]
): string {
  let redacted = text;
  for (const pattern of patterns) {
    redacted = redacted.replace(pattern.replacer, () => pattern.replacement);
  }
  return redacted;
}

export function checkSensitiveData(
  text: string,
  patterns: readonly SensitivePattern[]
): Violation | undefined {
  if (!containsSensitiveData(text, patterns)) {return undefined;}
  return {
    ruleId: 'no-sensitive-data',
    text,
    fixedText: redactSensitiveData(text, patterns),
  };
}

// ============================================================================
// Fragment Evaluation
// ============================================================================

/**
 * Run every rule over one fragment, in rule order. The case rule is only
 * evaluated for the first fragment of a call.
 */
export function evaluateFragment(
  text: string,
  isFirstFragment: boolean,
  patterns: readonly SensitivePattern[]
): Violation[] {
  const violations: Violation[] = [];

  if (isFirstFragment) {
    const caseViolation = checkLowercaseStart(text);
    if (caseViolation) {violations.push(caseViolation);}
  }

  const alphabetViolation = checkEnglishOnly(text);
  if (alphabetViolation) {violations.push(alphabetViolation);}

  const specialViolation = checkSpecialChars(text);
  if (specialViolation) {violations.push(specialViolation);}

  const sensitiveViolation = checkSensitiveData(text, patterns);
  if (sensitiveViolation) {violations.push(sensitiveViolation);}

  return violations;
}
