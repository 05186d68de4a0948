/**
 * Call-Site Resolver - finds the message argument of a logging call
 *
 * Resolution goes through the callee's declared identity, never its name
 * alone, so a project's own `info`/`warn` methods are not mistaken for a
 * logging library.
 */

import type { LoggingApiSpec } from './logging-apis.js';
import type { TypeResolver } from './type-resolver.js';
import type ts from 'typescript';

/**
 * A recognized logging call and its message argument
 */
export interface ResolvedCallSite {
  call: ts.CallExpression;
  /** The argument holding the message */
  messageExpression: ts.Expression;
  /** Position of that argument in the call */
  messageIndex: number;
  modulePath: string;
  memberName: string;
}

/**
 * Resolve a call against the logging API table.
 *
 * Returns undefined when the target is unknown, is not a logging API, or
 * none of its candidate positions holds a string-typed argument.
 */
export function resolveCallSite(
  call: ts.CallExpression,
  spec: LoggingApiSpec,
  resolver: TypeResolver
): ResolvedCallSite | undefined {
  const callee = resolver.resolveCallee(call);
  if (!callee) {return undefined;}

  const positions = spec.messagePositions(callee.modulePath, callee.name);
  if (!positions) {return undefined;}

  for (const index of positions) {
    const argument = call.arguments[index];
    if (!argument) {break;}
    if (!resolver.isStringLike(argument)) {continue;}

    return {
      call,
      messageExpression: argument,
      messageIndex: index,
      modulePath: callee.modulePath,
      memberName: callee.name,
    };
  }

  return undefined;
}
