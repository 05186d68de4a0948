/**
 * Core type definitions shared by the extractor, the rules and the linter.
 */

// ============================================================================
// Rules
// ============================================================================

/**
 * Identifier of one of the four message rules
 */
export type RuleId =
  | 'lowercase-start'
  | 'english-only'
  | 'no-special-chars'
  | 'no-sensitive-data';

/**
 * A rule violation found in a single literal fragment
 */
export interface Violation {
  /** Rule that matched */
  ruleId: RuleId;
  /** The fragment text that was judged */
  text: string;
  /** Corrected text, when the rule knows a fix */
  fixedText?: string | undefined;
}

/**
 * A compiled sensitive-data pattern
 */
export interface SensitivePattern {
  /** Trimmed source text the pattern was compiled from */
  source: string;
  /** Case-insensitive matcher used for detection */
  matcher: RegExp;
  /** Global variant of the matcher used for redaction */
  replacer: RegExp;
  /** Text every match is replaced with */
  replacement: string;
}

// ============================================================================
// Positions
// ============================================================================

/**
 * Character offsets into a source file, end exclusive
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Zero-based line/character position
 */
export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * A source rewrite attached to a diagnostic
 */
export interface SuggestedRewrite {
  /** Human-readable title of the fix */
  title: string;
  /** Span being replaced (the whole message argument) */
  span: TextSpan;
  range: Range;
  /** Replacement source text, already quoted */
  newText: string;
}

/**
 * A reportable finding on one logging call's message argument
 */
export interface LogMessageDiagnostic {
  ruleId: RuleId;
  /** Fixed rule message */
  message: string;
  /** File the call lives in */
  file: string;
  /** Span of the full message argument */
  span: TextSpan;
  range: Range;
  /** The literal fragment that violated the rule */
  text: string;
  fixedText?: string | undefined;
  /** Present only when the argument is a single literal */
  rewrite?: SuggestedRewrite | undefined;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration accepted by the engine
 */
export interface LintConfig {
  /** Extra sensitive-data patterns, appended after the built-in set */
  sensitivePatterns: string[];
  /** File globs the host should not lint */
  ignore: string[];
}
