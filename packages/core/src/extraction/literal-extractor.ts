/**
 * Literal Extractor - literal text fragments of a message expression
 *
 * Understands string literal leaves and `+` concatenation trees. Every other
 * expression contributes nothing, without stopping the walk.
 */

import ts from 'typescript';

/**
 * Remove any number of enclosing parentheses
 */
export function skipParentheses(expression: ts.Expression): ts.Expression {
  let current = expression;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

/**
 * A string literal or a backtick literal without substitutions
 */
export function isStringLiteralLeaf(
  node: ts.Node
): node is ts.StringLiteral | ts.NoSubstitutionTemplateLiteral {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node);
}

/**
 * Collect the literal fragments of an expression in left-to-right order.
 *
 * Unterminated literals are skipped. The result is empty when nothing in
 * the expression is statically known text.
 */
export function extractLiteralFragments(expression: ts.Expression): string[] {
  const fragments: string[] = [];
  collect(expression, fragments);
  return fragments;
}

function collect(expression: ts.Expression, fragments: string[]): void {
  const node = skipParentheses(expression);

  if (isStringLiteralLeaf(node)) {
    if (!node.isUnterminated) {
      fragments.push(node.text);
    }
    return;
  }

  if (ts.isBinaryExpression(node) && node.operatorToken.kind === ts.SyntaxKind.PlusToken) {
    collect(node.left, fragments);
    collect(node.right, fragments);
  }
}

/**
 * Whether a rewrite of the whole expression is sound: it must be exactly one
 * terminated literal, with no concatenation.
 */
export function isRewriteSafe(expression: ts.Expression): boolean {
  const node = skipParentheses(expression);
  return isStringLiteralLeaf(node) && !node.isUnterminated;
}
