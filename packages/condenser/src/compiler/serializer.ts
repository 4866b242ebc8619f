/**
 * AST -> native JSON. The inverse of the parser: nodes parsed from
 * qualified class names are written back with the same names, everything
 * else gets the short tag.
 *
 * @module compiler/serializer
 */

import type { Expr, JsonObject, NodeBase, Policy, Statement } from './ast.js';
import { parseQualifiedTag, RETURN_TYPES, SET_TAGS } from './parser.js';

function className(node: NodeBase, short: string): string {
  const qualified = node.nativeClass;
  return qualified !== undefined && parseQualifiedTag(qualified) === short ? qualified : short;
}

export function serializeExpression(expr: Expr): JsonObject {
  switch (expr.kind) {
    case 'bool':
      return { class: className(expr, 'StaticBooleanExpr'), type: expr.value ? 'True' : 'False' };
    case 'int':
      return { class: className(expr, 'LiteralLong'), value: expr.value };
    case 'attr':
      return { class: className(expr, 'RouteAttribute'), attribute: expr.attribute };
    case 'and':
      return { class: className(expr, 'Conjunction'), conjuncts: expr.operands.map(serializeExpression) };
    case 'or':
      return { class: className(expr, 'Disjunction'), disjuncts: expr.operands.map(serializeExpression) };
    case 'not':
      return { class: className(expr, 'Not'), expr: serializeExpression(expr.operand) };
    case 'compare':
      return {
        class: className(expr, 'IntComparison'),
        comparator: expr.comparator,
        left: serializeExpression(expr.left),
        right: serializeExpression(expr.right),
      };
    case 'matchCommunity':
      return {
        class: className(expr, 'MatchCommunity'),
        communitySetExpr: serializeExpression(expr.communities),
        community: expr.community,
      };
    case 'matchPrefix':
      return {
        class: className(expr, 'MatchPrefixSet'),
        prefix: serializeExpression(expr.prefix),
        prefixSet: { class: expr.setClass ?? 'ExplicitPrefixSet', prefixSpace: [...expr.ranges] },
      };
    case 'communitySet':
      return { class: className(expr, 'LiteralCommunitySet'), communitySet: [...expr.communities] };
    case 'union':
      return { class: className(expr, 'CommunitySetUnion'), exprs: expr.operands.map(serializeExpression) };
    case 'ip':
      return { class: className(expr, 'LiteralIp'), ip: expr.address };
    case 'network':
      return { class: className(expr, 'LiteralPrefix'), prefix: expr.prefix };
    case 'asPath':
      return { class: className(expr, 'LiteralAsPath'), asns: [...expr.asns] };
    case 'prepend':
      return { class: className(expr, 'PrependAsPath'), asns: [...expr.asns], expr: serializeExpression(expr.operand) };
    case 'call':
      return { class: className(expr, 'CallExpr'), calledPolicyName: expr.policy };
    case 'adjustLocalPref':
      return expr.op === 'increment'
        ? { class: className(expr, 'IncrementLocalPreference'), addend: expr.amount }
        : { class: className(expr, 'DecrementLocalPreference'), subtrahend: expr.amount };
    case 'matchNamedPrefix':
      return {
        class: className(expr, 'MatchPrefixSet'),
        prefix: serializeExpression(expr.prefix),
        prefixSet: { class: expr.setClass ?? 'NamedPrefixSet', name: expr.name },
      };
    case 'communityRef':
      return { class: className(expr, 'CommunitySetReference'), name: expr.name };
    case 'unsupported':
      // the raw payload already carries its own class field
      return expr.raw;
  }
}

export function serializeStatement(stmt: Statement): JsonObject {
  switch (stmt.kind) {
    case 'if': {
      const out: JsonObject = {
        class: className(stmt, 'If'),
        guard: serializeExpression(stmt.guard),
        trueStatements: stmt.trueBranch.map(serializeStatement),
        falseStatements: stmt.falseBranch.map(serializeStatement),
      };
      if (stmt.comment !== undefined) out['comment'] = stmt.comment;
      return out;
    }
    case 'set': {
      const { tag, field } = SET_TAGS[stmt.attribute];
      return { class: className(stmt, tag), [field]: serializeExpression(stmt.value) };
    }
    case 'return':
      return { class: className(stmt, 'StaticStatement'), type: RETURN_TYPES[stmt.disposition] };
  }
}

export function serializePolicy(policy: Policy): JsonObject {
  return { name: policy.name, statements: policy.statements.map(serializeStatement) };
}
