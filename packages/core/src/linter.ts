/**
 * Log Message Linter - orchestrates a lint pass
 *
 * Built once per configuration and immutable afterwards, so one instance can
 * serve any number of passes. A pass walks one source file in document order:
 * resolve each call, extract the message fragments, run the rules over each
 * fragment and build one diagnostic per violation.
 */

import ts from 'typescript';

import { buildDiagnostic } from './diagnostics/diagnostic-builder.js';
import { extractLiteralFragments, isRewriteSafe } from './extraction/literal-extractor.js';
import { silentLogger } from './logging/logger.js';
import { resolveCallSite } from './resolution/call-site-resolver.js';
import { createLoggingApiSpec, DEFAULT_LOGGING_APIS } from './resolution/logging-apis.js';
import { createCheckerResolver } from './resolution/type-resolver.js';
import { evaluateFragment } from './rules/text-rules.js';
import { compileSensitivePatterns, DEFAULT_SENSITIVE_PATTERNS } from './sensitive/pattern-compiler.js';

import type { Logger } from './logging/logger.js';
import type { LoggingApiFamily, LoggingApiSpec } from './resolution/logging-apis.js';
import type { TypeResolver } from './resolution/type-resolver.js';
import type { LintConfig, LogMessageDiagnostic, SensitivePattern } from './types.js';

// ============================================================================
// Options
// ============================================================================

export interface LinterOptions {
  /** Logger for debug output; silent by default */
  logger?: Logger | undefined;
  /** Logging API families to recognize; pino and winston by default */
  apis?: readonly LoggingApiFamily[] | undefined;
}

/**
 * Decides whether a source file of a program is linted
 */
export type SourceFileFilter = (sourceFile: ts.SourceFile) => boolean;

// ============================================================================
// Linter
// ============================================================================

export class LogMessageLinter {
  readonly apiSpec: LoggingApiSpec;
  readonly patterns: readonly SensitivePattern[];
  private readonly logger: Logger;

  constructor(apiSpec: LoggingApiSpec, patterns: readonly SensitivePattern[], logger: Logger) {
    this.apiSpec = apiSpec;
    this.patterns = Object.freeze([...patterns]);
    this.logger = logger;
    Object.freeze(this);
  }

  /**
   * Lint every logging call in one source file
   */
  lintSourceFile(sourceFile: ts.SourceFile, resolver: TypeResolver): LogMessageDiagnostic[] {
    const diagnostics: LogMessageDiagnostic[] = [];

    const visit = (node: ts.Node): void => {
      if (ts.isCallExpression(node)) {
        this.lintCall(node, sourceFile, resolver, diagnostics);
      }
      ts.forEachChild(node, visit);
    };
    visit(sourceFile);

    this.logger.debug(`${sourceFile.fileName}: ${diagnostics.length} diagnostic(s)`);
    return diagnostics;
  }

  /**
   * Lint every project source file of a program, in program order.
   * Declaration files and files from external libraries are skipped.
   */
  lintProgram(program: ts.Program, filter?: SourceFileFilter): LogMessageDiagnostic[] {
    const resolver = createCheckerResolver(program.getTypeChecker());
    const diagnostics: LogMessageDiagnostic[] = [];

    for (const sourceFile of program.getSourceFiles()) {
      if (sourceFile.isDeclarationFile || program.isSourceFileFromExternalLibrary(sourceFile)) {
        continue;
      }
      if (filter && !filter(sourceFile)) {
        continue;
      }
      diagnostics.push(...this.lintSourceFile(sourceFile, resolver));
    }

    return diagnostics;
  }

  private lintCall(
    call: ts.CallExpression,
    sourceFile: ts.SourceFile,
    resolver: TypeResolver,
    diagnostics: LogMessageDiagnostic[]
  ): void {
    const site = resolveCallSite(call, this.apiSpec, resolver);
    if (!site) {return;}

    const fragments = extractLiteralFragments(site.messageExpression);
    if (fragments.length === 0) {return;}

    const rewriteAllowed = isRewriteSafe(site.messageExpression);

    fragments.forEach((fragment, index) => {
      for (const violation of evaluateFragment(fragment, index === 0, this.patterns)) {
        diagnostics.push(buildDiagnostic(site.messageExpression, sourceFile, violation, rewriteAllowed));
      }
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build a linter from configuration.
 *
 * @throws InvalidPatternError if a custom sensitive pattern does not compile
 */
export function createLinter(
  config: Pick<LintConfig, 'sensitivePatterns'>,
  options: LinterOptions = {}
): LogMessageLinter {
  const logger = options.logger ?? silentLogger;
  const patterns = compileSensitivePatterns(DEFAULT_SENSITIVE_PATTERNS, config.sensitivePatterns);
  const apiSpec = createLoggingApiSpec(options.apis ?? DEFAULT_LOGGING_APIS);

  logger.debug(
    `compiled ${patterns.length} sensitive pattern(s), ${apiSpec.size} logging API entr${apiSpec.size === 1 ? 'y' : 'ies'}`
  );

  return new LogMessageLinter(apiSpec, patterns, logger);
}
