/**
 * Replaces references to named prefix lists and community sets with the
 * definitions declared on the same node.
 *
 * A prefix list is an ordered list of permit/deny lines; the first line
 * whose range matches decides. A route matching no line is denied.
 *
 * @module compiler/inliner
 */

import { ParseError } from '../core/errors.js';
import { parsePrefixRange } from '../network/ipv4.js';
import { and, bool, mapChildren, matchPrefix, not, or, type Expr, type Policy, type Statement } from './ast.js';
import { simplify } from './simplifier.js';

export interface PrefixListLine {
  action: 'permit' | 'deny';
  /** Prefix range, e.g. `10.0.0.0/8:16-24`. */
  range: string;
}

export interface Definitions {
  prefixLists: ReadonlyMap<string, readonly PrefixListLine[]>;
  communitySets: ReadonlyMap<string, Expr>;
}

/**
 * The condition under which `prefix` is permitted by a prefix list.
 */
export function prefixListCondition(lines: readonly PrefixListLine[], prefix: Expr): Expr {
  const permits: Expr[] = [];
  const earlier: Expr[] = [];
  for (const line of lines) {
    if (parsePrefixRange(line.range) === null) {
      throw new ParseError(`Invalid prefix range '${line.range}'`, '');
    }
    const matches = matchPrefix([line.range], prefix);
    if (line.action === 'permit') permits.push(and(...earlier.map((e) => not(e)), matches));
    earlier.push(matches);
  }
  return permits.length === 0 ? bool(false) : simplify(or(...permits));
}

/**
 * Inline every reference in `expr`.
 *
 * @throws ParseError on a reference with no definition
 */
export function inlineExpression(expr: Expr, defs: Definitions): Expr {
  switch (expr.kind) {
    case 'matchNamedPrefix': {
      const lines = defs.prefixLists.get(expr.name);
      if (!lines) throw new ParseError(`Undefined prefix list '${expr.name}'`, '');
      return prefixListCondition(lines, inlineExpression(expr.prefix, defs));
    }
    case 'communityRef': {
      const set = defs.communitySets.get(expr.name);
      if (!set) throw new ParseError(`Undefined community set '${expr.name}'`, '');
      return set;
    }
    default:
      return mapChildren(expr, (child) => inlineExpression(child, defs));
  }
}

function inlineStatement(stmt: Statement, defs: Definitions): Statement {
  switch (stmt.kind) {
    case 'if':
      return {
        ...stmt,
        guard: inlineExpression(stmt.guard, defs),
        trueBranch: stmt.trueBranch.map((s) => inlineStatement(s, defs)),
        falseBranch: stmt.falseBranch.map((s) => inlineStatement(s, defs)),
      };
    case 'set':
      return { ...stmt, value: inlineExpression(stmt.value, defs) };
    case 'return':
      return stmt;
  }
}

export function inlinePolicy(policy: Policy, defs: Definitions): Policy {
  return { name: policy.name, statements: policy.statements.map((s) => inlineStatement(s, defs)) };
}
