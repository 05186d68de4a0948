/**
 * Diagnostic Builder - turns violations into reportable diagnostics
 *
 * The diagnostic always spans the whole message argument. A rewrite is only
 * attached when the argument is a single literal and the fix changes it.
 */

import ts from 'typescript';

import { isStringLiteralLeaf, skipParentheses } from '../extraction/literal-extractor.js';
import { RULE_MESSAGES } from '../rules/text-rules.js';

import type {
  LogMessageDiagnostic,
  Range,
  SuggestedRewrite,
  TextSpan,
  Violation,
} from '../types.js';

/** Title of every suggested rewrite */
export const REWRITE_TITLE = 'fix log message';

export type QuoteStyle = 'single' | 'double' | 'backtick';

const printer = ts.createPrinter({ removeComments: true });

// ============================================================================
// Quoting
// ============================================================================

/**
 * Quote style of the literal at the core of an expression; double quotes
 * when it is not a literal.
 */
export function quoteStyleOf(expression: ts.Expression, sourceFile: ts.SourceFile): QuoteStyle {
  const node = skipParentheses(expression);
  if (ts.isNoSubstitutionTemplateLiteral(node)) {return 'backtick';}
  if (ts.isStringLiteral(node) && sourceFile.text.charAt(node.getStart(sourceFile)) === "'") {
    return 'single';
  }
  return 'double';
}

/**
 * Encode text as a TypeScript literal in the given quote style.
 * Non-ASCII characters are kept as they are.
 */
export function printStringLiteral(
  text: string,
  style: QuoteStyle,
  sourceFile?: ts.SourceFile
): string {
  const literal = style === 'backtick'
    ? ts.factory.createNoSubstitutionTemplateLiteral(text)
    : ts.factory.createStringLiteral(text, style === 'single');
  ts.setEmitFlags(literal, ts.EmitFlags.NoAsciiEscaping);
  return printer.printNode(ts.EmitHint.Unspecified, literal, sourceFile ?? emptySourceFile());
}

let placeholderFile: ts.SourceFile | undefined;

function emptySourceFile(): ts.SourceFile {
  placeholderFile ??= ts.createSourceFile('literal.ts', '', ts.ScriptTarget.Latest);
  return placeholderFile;
}

// ============================================================================
// Spans
// ============================================================================

export function spanOf(node: ts.Node, sourceFile: ts.SourceFile): TextSpan {
  return { start: node.getStart(sourceFile), end: node.getEnd() };
}

export function rangeOf(span: TextSpan, sourceFile: ts.SourceFile): Range {
  return {
    start: sourceFile.getLineAndCharacterOfPosition(span.start),
    end: sourceFile.getLineAndCharacterOfPosition(span.end),
  };
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Build the diagnostic for one violation on a message argument
 */
export function buildDiagnostic(
  messageExpression: ts.Expression,
  sourceFile: ts.SourceFile,
  violation: Violation,
  rewriteAllowed: boolean
): LogMessageDiagnostic {
  const span = spanOf(messageExpression, sourceFile);
  const range = rangeOf(span, sourceFile);

  const diagnostic: LogMessageDiagnostic = {
    ruleId: violation.ruleId,
    message: RULE_MESSAGES[violation.ruleId],
    file: sourceFile.fileName,
    span,
    range,
    text: violation.text,
    fixedText: violation.fixedText,
  };

  const fixedText = violation.fixedText;
  if (
    rewriteAllowed &&
    fixedText !== undefined &&
    fixedText !== '' &&
    fixedText !== violation.text &&
    isStringLiteralLeaf(skipParentheses(messageExpression))
  ) {
    const rewrite: SuggestedRewrite = {
      title: REWRITE_TITLE,
      span,
      range,
      newText: printStringLiteral(fixedText, quoteStyleOf(messageExpression, sourceFile), sourceFile),
    };
    diagnostic.rewrite = rewrite;
  }

  return diagnostic;
}
