/**
 * logmsglint-core - log message extraction and validation engine
 */

// Types
export type {
  RuleId,
  Violation,
  SensitivePattern,
  TextSpan,
  Position,
  Range,
  SuggestedRewrite,
  LogMessageDiagnostic,
  LintConfig,
} from './types.js';

// Errors
export {
  LogMsgLintError,
  InvalidPatternError,
  InvalidConfigurationError,
  ConfigLoadError,
  ConfigParseError,
} from './errors.js';

// Logging
export { silentLogger, createConsoleLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

// Sensitive patterns
export {
  compileSensitivePatterns,
  DEFAULT_SENSITIVE_PATTERNS,
  REDACTION_TOKEN,
} from './sensitive/pattern-compiler.js';

// Rules
export {
  RULE_MESSAGES,
  checkLowercaseStart,
  checkEnglishOnly,
  checkSpecialChars,
  checkSensitiveData,
  containsNonLatinLetters,
  containsSpecialCharsOrEmoji,
  stripSpecialCharsAndEmoji,
  containsSensitiveData,
  redactSensitiveData,
  evaluateFragment,
} from './rules/text-rules.js';

// Extraction
export {
  extractLiteralFragments,
  isRewriteSafe,
  skipParentheses,
} from './extraction/literal-extractor.js';

// Resolution
export {
  createLoggingApiSpec,
  DEFAULT_LOGGING_APIS,
  PINO_API,
  WINSTON_API,
} from './resolution/logging-apis.js';
export type { LoggingApiFamily, LoggingApiSpec } from './resolution/logging-apis.js';
export {
  createCheckerResolver,
  declaringModuleOf,
  packageNameFromPath,
} from './resolution/type-resolver.js';
export type { CalleeIdentity, TypeResolver } from './resolution/type-resolver.js';
export { resolveCallSite } from './resolution/call-site-resolver.js';
export type { ResolvedCallSite } from './resolution/call-site-resolver.js';

// Diagnostics
export {
  buildDiagnostic,
  printStringLiteral,
  REWRITE_TITLE,
} from './diagnostics/diagnostic-builder.js';
export { applyRewrites } from './diagnostics/rewrite-applier.js';
export type { RewriteResult } from './diagnostics/rewrite-applier.js';

// Configuration
export { parseConfig, emptyConfig } from './config/config-parser.js';
export { loadConfig, CONFIG_FILE, ENV_SENSITIVE_PATTERNS } from './config/config-loader.js';
export type { ConfigLoaderOptions } from './config/config-loader.js';

// Linter
export { LogMessageLinter, createLinter } from './linter.js';
export type { LinterOptions, SourceFileFilter } from './linter.js';
