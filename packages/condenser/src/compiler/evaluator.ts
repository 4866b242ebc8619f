/**
 * Partial evaluator for policy expressions over a route record.
 *
 * Attribute references are replaced by the record's slots. Whatever can be
 * decided from concrete slots is folded to a literal; the rest stays as a
 * residual expression over the input route's attributes.
 *
 * @module compiler/evaluator
 */

import { InterpretError } from '../core/errors.js';
import type { RouteRecord } from '../interpreter/route-record.js';
import {
  adjustLocalPref,
  attr,
  exprChildren,
  int,
  isLiteral,
  mapChildren,
  type AdjustLocalPrefNode,
  type Expr,
  type LiteralExpr,
} from './ast.js';
import { simplifyNode } from './simplifier.js';
import { typeCheck, type ExprType } from './type-checker.js';

/** Operand type each operator requires of its children. */
function operandType(expr: Expr): ExprType | null {
  switch (expr.kind) {
    case 'and':
    case 'or':
    case 'not':
      return 'boolean';
    case 'compare':
      return 'integer';
    case 'matchCommunity':
    case 'union':
      return 'communities';
    case 'matchPrefix':
    case 'matchNamedPrefix':
      return 'prefix';
    case 'prepend':
      return 'aspath';
    default:
      return null;
  }
}

function checkOperands(expr: Expr): void {
  const expected = operandType(expr);
  if (expected === null) return;
  for (const child of exprChildren(expr)) {
    const actual = typeCheck(child).inferredType;
    if (actual !== expected && actual !== 'unknown') {
      throw new InterpretError(`Type mismatch in ${expr.kind}: expected ${expected}, got ${actual}`);
    }
  }
}

export interface EvaluationEnv {
  /** Residual accept condition of the named policy run over `record`. */
  call?: (policy: string, record: RouteRecord) => Expr;
}

function signedAmount(node: AdjustLocalPrefNode): number {
  return node.op === 'increment' ? node.amount : -node.amount;
}

function offsetLocalPref(delta: number): Expr {
  if (delta === 0) return attr('localPreference');
  return delta > 0 ? adjustLocalPref('increment', delta) : adjustLocalPref('decrement', -delta);
}

/**
 * Apply an adjustment to the record's current local preference. A residual
 * adjustment is always relative to the input route's value, so stacked
 * adjustments add up.
 */
function adjust(current: Expr, node: AdjustLocalPrefNode): Expr {
  const delta = signedAmount(node);
  if (current.kind === 'int') return int(current.value + delta);
  if (current.kind === 'adjustLocalPref') return offsetLocalPref(signedAmount(current) + delta);
  if (current.kind === 'attr' && current.attribute === 'localPreference') return offsetLocalPref(delta);
  throw new InterpretError(`Cannot adjust a local preference of kind '${current.kind}'`);
}

/**
 * Evaluate `expr` against `record`.
 *
 * @returns a literal when the result is fully determined, otherwise a
 *   simplified residual expression.
 * @throws InterpretError on an attribute missing from the record, an
 *   unsupported construct, an unresolved reference, a call without `env`,
 *   or an operand of the wrong type.
 */
export function partialEvaluate(expr: Expr, record: RouteRecord, env: EvaluationEnv = {}): Expr {
  switch (expr.kind) {
    case 'attr':
      return record.lookup(expr.attribute);
    case 'adjustLocalPref':
      return adjust(record.lookup('localPreference'), expr);
    case 'call':
      if (!env.call) throw new InterpretError(`Cannot evaluate call to policy '${expr.policy}' here`);
      return env.call(expr.policy, record);
    case 'matchNamedPrefix':
      throw new InterpretError(`Unresolved prefix list '${expr.name}'`);
    case 'communityRef':
      throw new InterpretError(`Unresolved community set '${expr.name}'`);
    case 'unsupported':
      throw new InterpretError(`Cannot evaluate unsupported construct '${expr.tag}'`);
    default: {
      if (isLiteral(expr)) return expr;
      const rebuilt = mapChildren(expr, (child) => partialEvaluate(child, record, env));
      checkOperands(rebuilt);
      return simplifyNode(rebuilt);
    }
  }
}

/**
 * Evaluate `expr` to a literal.
 *
 * @throws InterpretError if the result still depends on symbolic attributes.
 */
export function evaluateConcrete(expr: Expr, record: RouteRecord, env: EvaluationEnv = {}): LiteralExpr {
  const result = partialEvaluate(expr, record, env);
  if (!isLiteral(result)) {
    throw new InterpretError(`Expression of kind '${expr.kind}' depends on symbolic route attributes`);
  }
  return result;
}

export type LiteralValue = boolean | number | string | readonly string[] | readonly number[];

/** The plain value a literal node stands for. */
export function literalValue(literal: LiteralExpr): LiteralValue {
  switch (literal.kind) {
    case 'bool':
    case 'int':
      return literal.value;
    case 'ip':
      return literal.address;
    case 'network':
      return literal.prefix;
    case 'communitySet':
      return literal.communities;
    case 'asPath':
      return literal.asns;
  }
}
