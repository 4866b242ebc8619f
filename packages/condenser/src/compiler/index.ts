/**
 * Routing-policy expression compiler: AST model, native-encoding parser and
 * serializer, type checker, simplifier and partial evaluator.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { compile, simplify } from 'route-condenser/compiler';
 *
 * const guard = compile({
 *   class: 'Conjunction',
 *   conjuncts: [
 *     { class: 'StaticBooleanExpr', type: 'True' },
 *     { class: 'MatchCommunity', community: '65000:1',
 *       communitySetExpr: { class: 'RouteAttribute', attribute: 'communities' } },
 *   ],
 * });
 * simplify(guard); // the MatchCommunity node alone
 * ```
 */

export { parseExpression, parseStatement, parseStatements, parsePolicy, parseQualifiedTag } from './parser.js';
export type { ParseOptions } from './parser.js';

export { serializeExpression, serializeStatement, serializePolicy } from './serializer.js';

export { typeCheck, checkPolicy, ATTRIBUTE_TYPES } from './type-checker.js';
export type { ExprType, TypeIssue, TypeCheckResult } from './type-checker.js';

export { simplify, simplifyStatements, simplifyPolicy, simplifyTopology, negate } from './simplifier.js';

export { partialEvaluate, evaluateConcrete, literalValue } from './evaluator.js';
export type { EvaluationEnv, LiteralValue } from './evaluator.js';

export { inlineExpression, inlinePolicy, prefixListCondition } from './inliner.js';
export type { Definitions, PrefixListLine } from './inliner.js';

export {
  ATTRIBUTE_NAMES,
  COMPARATORS,
  adjustLocalPref,
  and,
  asPath,
  attr,
  bool,
  call,
  calledPolicies,
  communityRef,
  communitySet,
  compare,
  exprChildren,
  exprDepth,
  exprEquals,
  exprSize,
  ifStmt,
  int,
  ip,
  isLiteral,
  mapChildren,
  matchCommunity,
  matchNamedPrefix,
  matchPrefix,
  network,
  not,
  or,
  prepend,
  ret,
  setStmt,
  statementsEqual,
  statementsSize,
  union,
} from './ast.js';
export type {
  AttributeName,
  Comparator,
  Disposition,
  Expr,
  ExprKind,
  IfStatement,
  JsonObject,
  JsonValue,
  LiteralExpr,
  NodeBase,
  Policy,
  ReturnStatement,
  SetStatement,
  SettableAttribute,
  Statement,
} from './ast.js';

import type { Expr } from './ast.js';
import { parseExpression, type ParseOptions } from './parser.js';

/**
 * Parse a native expression object into an AST.
 */
export function compile(json: unknown, options: ParseOptions = {}): Expr {
  return parseExpression(json, options);
}
