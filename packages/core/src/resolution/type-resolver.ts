/**
 * Type Resolver - read-only view over the host's type information
 *
 * The engine depends on this interface only; the checker-backed
 * implementation below is what hosts normally inject.
 */

import ts from 'typescript';

import { skipParentheses } from '../extraction/literal-extractor.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Declared identity of a call target
 */
export interface CalleeIdentity {
  /** Module the target is declared in (npm package name for library code) */
  modulePath: string;
  /** Declared function or member name */
  name: string;
}

export interface TypeResolver {
  /** Statically known target of a call, or undefined when it cannot be resolved */
  resolveCallee(call: ts.CallExpression): CalleeIdentity | undefined;
  /** Whether the static type of an expression is string-like */
  isStringLike(expression: ts.Expression): boolean;
}

// ============================================================================
// Module Paths
// ============================================================================

const NODE_MODULES_SEGMENT = '/node_modules/';
const TYPES_SCOPE = '@types/';

/**
 * Derive the npm package name from a file path inside node_modules.
 *
 * `@types/x` maps to `x` and `@types/scope__name` to `@scope/name`.
 * Returns undefined for files outside node_modules.
 */
export function packageNameFromPath(fileName: string): string | undefined {
  const normalized = fileName.replace(/\\/g, '/');
  const index = normalized.lastIndexOf(NODE_MODULES_SEGMENT);
  if (index === -1) {return undefined;}

  const segments = normalized.slice(index + NODE_MODULES_SEGMENT.length).split('/');
  const [first, second] = segments;
  if (!first) {return undefined;}

  const name = first.startsWith('@') && second ? `${first}/${second}` : first;
  if (!name.startsWith(TYPES_SCOPE)) {return name;}

  const typed = name.slice(TYPES_SCOPE.length);
  const scoped = typed.split('__');
  return scoped.length === 2 ? `@${scoped[0]}/${scoped[1]}` : typed;
}

/**
 * Module a declaration belongs to: the nearest ambient `declare module "x"`,
 * else the package owning its file, else the file itself.
 */
export function declaringModuleOf(declaration: ts.Declaration): string {
  let current: ts.Node | undefined = declaration.parent;
  while (current) {
    if (ts.isModuleDeclaration(current) && ts.isStringLiteral(current.name)) {
      return current.name.text;
    }
    current = current.parent;
  }

  const fileName = declaration.getSourceFile().fileName;
  return packageNameFromPath(fileName) ?? fileName;
}

// ============================================================================
// Checker-Backed Resolver
// ============================================================================

const CALLABLE_SYMBOL_FLAGS =
  ts.SymbolFlags.Function | ts.SymbolFlags.Method | ts.SymbolFlags.Property | ts.SymbolFlags.Variable;

/**
 * Node whose symbol names the call target: the identifier itself, or the
 * member name of a property access.
 */
function calleeNameNode(call: ts.CallExpression): ts.Identifier | ts.PrivateIdentifier | undefined {
  const callee = skipParentheses(call.expression);
  if (ts.isIdentifier(callee)) {return callee;}
  if (ts.isPropertyAccessExpression(callee)) {return callee.name;}
  return undefined;
}

function isStringLikeType(type: ts.Type): boolean {
  if (type.isUnion()) {
    return type.types.every(isStringLikeType);
  }
  return (type.flags & ts.TypeFlags.StringLike) !== 0;
}

/**
 * Create a resolver backed by a TypeScript type checker
 */
export function createCheckerResolver(checker: ts.TypeChecker): TypeResolver {
  return {
    resolveCallee(call: ts.CallExpression): CalleeIdentity | undefined {
      const nameNode = calleeNameNode(call);
      if (!nameNode) {return undefined;}

      let symbol = checker.getSymbolAtLocation(nameNode);
      if (!symbol) {return undefined;}
      if (symbol.flags & ts.SymbolFlags.Alias) {
        symbol = checker.getAliasedSymbol(symbol);
      }
      if ((symbol.flags & CALLABLE_SYMBOL_FLAGS) === 0) {return undefined;}

      const declaration = symbol.valueDeclaration ?? symbol.declarations?.[0];
      if (!declaration) {return undefined;}

      return {
        modulePath: declaringModuleOf(declaration),
        name: symbol.getName(),
      };
    },

    isStringLike(expression: ts.Expression): boolean {
      return isStringLikeType(checker.getTypeAtLocation(expression));
    },
  };
}
