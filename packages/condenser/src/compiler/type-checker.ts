/**
 * Type checker for policy expressions and statements.
 *
 * Infers the value type of each expression and reports operators applied to
 * incompatible operands, e.g. an integer comparison over a community set.
 *
 * @module compiler/type-checker
 */

import type { AttributeName, Expr, Policy, SettableAttribute, Statement } from './ast.js';

export type ExprType = 'boolean' | 'integer' | 'communities' | 'prefix' | 'ip' | 'aspath' | 'unknown';

export interface TypeIssue {
  message: string;
  node: Expr;
  severity: 'error' | 'warning';
  /** Statement location within a policy, e.g. `2.true.0`. */
  location?: string;
}

export interface TypeCheckResult {
  valid: boolean;
  issues: TypeIssue[];
  inferredType: ExprType;
}

export const ATTRIBUTE_TYPES: Readonly<Record<AttributeName, ExprType>> = {
  prefix: 'prefix',
  nextHop: 'ip',
  communities: 'communities',
  localPreference: 'integer',
  metric: 'integer',
  weight: 'integer',
  tag: 'integer',
  asPath: 'aspath',
};

export function typeCheck(expr: Expr): TypeCheckResult {
  const issues: TypeIssue[] = [];
  const inferred = infer(expr, issues);
  return {
    valid: issues.every((i) => i.severity !== 'error'),
    issues,
    inferredType: inferred,
  };
}

function expect(node: Expr, expected: ExprType, issues: TypeIssue[], role: string): void {
  const actual = infer(node, issues);
  if (actual !== expected && actual !== 'unknown') {
    issues.push({
      message: `${role} must be ${expected}, got ${actual}`,
      node,
      severity: 'error',
    });
  }
}

function infer(expr: Expr, issues: TypeIssue[]): ExprType {
  switch (expr.kind) {
    case 'bool':
      return 'boolean';
    case 'int':
      return 'integer';
    case 'ip':
      return 'ip';
    case 'network':
      return 'prefix';
    case 'communitySet':
      return 'communities';
    case 'asPath':
      return 'aspath';
    case 'attr':
      return ATTRIBUTE_TYPES[expr.attribute];

    case 'and':
    case 'or':
      for (const operand of expr.operands) {
        expect(operand, 'boolean', issues, `Operand of ${expr.kind}`);
      }
      return 'boolean';

    case 'not':
      expect(expr.operand, 'boolean', issues, 'Operand of not');
      return 'boolean';

    case 'compare':
      expect(expr.left, 'integer', issues, 'Left side of comparison');
      expect(expr.right, 'integer', issues, 'Right side of comparison');
      return 'boolean';

    case 'matchCommunity':
      expect(expr.communities, 'communities', issues, 'Community match subject');
      return 'boolean';

    case 'matchPrefix':
      expect(expr.prefix, 'prefix', issues, 'Prefix match subject');
      return 'boolean';

    case 'union':
      for (const operand of expr.operands) {
        expect(operand, 'communities', issues, 'Operand of union');
      }
      return 'communities';

    case 'prepend':
      expect(expr.operand, 'aspath', issues, 'Prepend target');
      return 'aspath';

    case 'call':
      return 'boolean';

    case 'adjustLocalPref':
      return 'integer';

    case 'matchNamedPrefix':
      expect(expr.prefix, 'prefix', issues, 'Prefix match subject');
      return 'boolean';

    case 'communityRef':
      return 'communities';

    case 'unsupported':
      issues.push({
        message: `Unsupported construct '${expr.tag}' cannot be checked`,
        node: expr,
        severity: 'warning',
      });
      return 'unknown';
  }
}

function checkSet(attribute: SettableAttribute, value: Expr, issues: TypeIssue[]): void {
  expect(value, ATTRIBUTE_TYPES[attribute], issues, `Value assigned to ${attribute}`);
}

function checkStatements(statements: readonly Statement[], prefix: string, issues: TypeIssue[]): void {
  statements.forEach((stmt, i) => {
    const location = prefix ? `${prefix}.${i}` : String(i);
    const found: TypeIssue[] = [];
    switch (stmt.kind) {
      case 'if':
        expect(stmt.guard, 'boolean', found, 'Guard');
        checkStatements(stmt.trueBranch, `${location}.true`, issues);
        checkStatements(stmt.falseBranch, `${location}.false`, issues);
        break;
      case 'set':
        checkSet(stmt.attribute, stmt.value, found);
        break;
      case 'return':
        break;
    }
    for (const issue of found) {
      issues.push({ ...issue, location });
    }
  });
}

/**
 * Check every guard and assignment in a policy.
 */
export function checkPolicy(policy: Policy): { valid: boolean; issues: TypeIssue[] } {
  const issues: TypeIssue[] = [];
  checkStatements(policy.statements, '', issues);
  return { valid: issues.every((i) => i.severity !== 'error'), issues };
}
