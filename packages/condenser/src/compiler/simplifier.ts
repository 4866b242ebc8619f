/**
 * Boolean simplifier.
 *
 * Rewrites are applied bottom-up: every node is rewritten after its children
 * have been simplified, so a single pass reaches the fixed point. No rule
 * grows the tree.
 *
 * @module compiler/simplifier
 */

import { parsePrefix, parsePrefixRange, rangeMatches } from '../network/ipv4.js';
import { createTopology, type NetworkNode, type Topology } from '../network/topology.js';
import {
  bool,
  exprEquals,
  isLiteral,
  mapChildren,
  statementsEqual,
  type Comparator,
  type Expr,
  type Policy,
  type Statement,
} from './ast.js';

function compareInts(comparator: Comparator, left: number, right: number): boolean {
  switch (comparator) {
    case 'EQ':
      return left === right;
    case 'GE':
      return left >= right;
    case 'GT':
      return left > right;
    case 'LE':
      return left <= right;
    case 'LT':
      return left < right;
  }
}

/**
 * The logical negation of an already-simplified expression.
 */
export function negate(expr: Expr): Expr {
  if (expr.kind === 'bool') return bool(!expr.value);
  if (expr.kind === 'not') return expr.operand;
  return { kind: 'not', operand: expr };
}

function simplifyJunction(kind: 'and' | 'or', operands: readonly Expr[]): Expr {
  // `and` ignores true and is decided by false; `or` the reverse
  const identity = kind === 'and';
  const flat: Expr[] = [];
  for (const operand of operands) {
    const parts = operand.kind === kind ? operand.operands : [operand];
    for (const part of parts) {
      if (part.kind === 'bool') {
        if (part.value === identity) continue;
        return bool(!identity);
      }
      if (!flat.some((seen) => exprEquals(seen, part))) flat.push(part);
    }
  }
  for (const operand of flat) {
    if (operand.kind === 'not' && flat.some((other) => exprEquals(other, operand.operand))) {
      return bool(!identity);
    }
  }
  if (flat.length === 0) return bool(identity);
  if (flat.length === 1) return flat[0];
  return { kind, operands: flat };
}

function simplifyUnion(operands: readonly Expr[]): Expr {
  const rest: Expr[] = [];
  const communities: string[] = [];
  let literalAt = -1;
  for (const operand of operands) {
    const parts = operand.kind === 'union' ? operand.operands : [operand];
    for (const part of parts) {
      if (part.kind === 'communitySet') {
        if (literalAt === -1) literalAt = rest.length;
        for (const c of part.communities) {
          if (!communities.includes(c)) communities.push(c);
        }
      } else if (!rest.some((seen) => exprEquals(seen, part))) {
        rest.push(part);
      }
    }
  }
  const merged: Expr[] =
    literalAt === -1
      ? rest
      : [...rest.slice(0, literalAt), { kind: 'communitySet', communities }, ...rest.slice(literalAt)];
  return merged.length === 1 ? merged[0] : { kind: 'union', operands: merged };
}

function simplifyMatchCommunity(community: string, communities: Expr): Expr {
  if (communities.kind === 'communitySet') {
    return bool(communities.communities.includes(community));
  }
  if (communities.kind === 'union') {
    const literal = communities.operands.find((op) => op.kind === 'communitySet');
    if (literal && literal.kind === 'communitySet') {
      if (literal.communities.includes(community)) return bool(true);
      const remaining = communities.operands.filter((op) => op !== literal);
      return {
        kind: 'matchCommunity',
        community,
        communities: remaining.length === 1 ? remaining[0] : { kind: 'union', operands: remaining },
      };
    }
  }
  return { kind: 'matchCommunity', community, communities };
}

function simplifyMatchPrefix(ranges: readonly string[], prefix: Expr): Expr {
  if (prefix.kind === 'network') {
    const value = parsePrefix(prefix.prefix);
    if (value) {
      return bool(
        ranges.some((text) => {
          const range = parsePrefixRange(text);
          return range !== null && rangeMatches(range, value);
        }),
      );
    }
  }
  return { kind: 'matchPrefix', prefix, ranges };
}

function simplifyPrepend(asns: readonly number[], operand: Expr): Expr {
  if (asns.length === 0) return operand;
  if (operand.kind === 'asPath') return { kind: 'asPath', asns: [...asns, ...operand.asns] };
  if (operand.kind === 'prepend') return { kind: 'prepend', asns: [...asns, ...operand.asns], operand: operand.operand };
  return { kind: 'prepend', asns, operand };
}

/**
 * Rewrite a single node whose children are already simplified.
 */
export function simplifyNode(expr: Expr): Expr {
  switch (expr.kind) {
    case 'not':
      return negate(expr.operand);
    case 'and':
    case 'or':
      return simplifyJunction(expr.kind, expr.operands);
    case 'compare':
      if (expr.left.kind === 'int' && expr.right.kind === 'int') {
        return bool(compareInts(expr.comparator, expr.left.value, expr.right.value));
      }
      return expr;
    case 'union':
      return simplifyUnion(expr.operands);
    case 'matchCommunity':
      return simplifyMatchCommunity(expr.community, expr.communities);
    case 'matchPrefix':
      return simplifyMatchPrefix(expr.ranges, expr.prefix);
    case 'prepend':
      return simplifyPrepend(expr.asns, expr.operand);
    default:
      return expr;
  }
}

/**
 * Simplify an expression to its fixed point.
 *
 * The result is logically equivalent to the input, never larger, and
 * `simplify(simplify(e))` equals `simplify(e)`.
 */
export function simplify(expr: Expr): Expr {
  if (isLiteral(expr)) return expr;
  const rebuilt = mapChildren(expr, simplify);
  const result = simplifyNode(rebuilt);
  // an unchanged node keeps its native class
  return exprEquals(result, rebuilt) ? rebuilt : result;
}

// ============================================================================
// Statements
// ============================================================================

function endsBlock(statements: readonly Statement[]): boolean {
  const last = statements[statements.length - 1];
  return last !== undefined && terminates(last);
}

/** Whether every path through `stmt` ends in a `return`. */
export function terminates(stmt: Statement): boolean {
  switch (stmt.kind) {
    case 'return':
      return true;
    case 'if':
      return endsBlock(stmt.trueBranch) && endsBlock(stmt.falseBranch);
    case 'set':
      return false;
  }
}

function simplifyStatement(stmt: Statement): Statement[] {
  switch (stmt.kind) {
    case 'if': {
      const guard = simplify(stmt.guard);
      const trueBranch = simplifyStatements(stmt.trueBranch);
      const falseBranch = simplifyStatements(stmt.falseBranch);
      if (guard.kind === 'bool') return guard.value ? trueBranch : falseBranch;
      if (statementsEqual(trueBranch, falseBranch)) return trueBranch;
      return [{ ...stmt, guard, trueBranch, falseBranch }];
    }
    case 'set':
      return [{ ...stmt, value: simplify(stmt.value) }];
    case 'return':
      return [stmt];
  }
}

/**
 * Simplify guards and values, inline `if`s whose guard is constant or whose
 * branches agree, and drop statements that can no longer run.
 */
export function simplifyStatements(statements: readonly Statement[]): Statement[] {
  const out: Statement[] = [];
  for (const stmt of statements) {
    for (const simplified of simplifyStatement(stmt)) {
      out.push(simplified);
      if (terminates(simplified)) return out;
    }
  }
  return out;
}

export function simplifyPolicy(policy: Policy): Policy {
  return { name: policy.name, statements: simplifyStatements(policy.statements) };
}

/**
 * A new topology with every policy simplified. The result has its own
 * fingerprint.
 */
export function simplifyTopology(topology: Topology): Topology {
  const nodes: NetworkNode[] = [...topology.nodes.values()].map((node) => ({
    ...node,
    policies: Object.fromEntries(
      Object.entries(node.policies).map(([name, policy]) => [name, simplifyPolicy(policy)]),
    ),
  }));
  return createTopology(nodes, topology.edges);
}
