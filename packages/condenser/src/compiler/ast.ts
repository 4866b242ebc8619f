/**
 * AST node types for routing-policy expressions and statements.
 *
 * Expressions and statements are closed tagged unions discriminated by
 * `kind`; every kind has a fixed arity. Nodes are plain immutable data, so
 * trees can be shared read-only between queries.
 *
 * @module compiler/ast
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type AttributeName =
  | 'prefix'
  | 'nextHop'
  | 'communities'
  | 'localPreference'
  | 'metric'
  | 'weight'
  | 'tag'
  | 'asPath';

/** Attributes a policy may assign; the destination prefix is fixed. */
export type SettableAttribute = Exclude<AttributeName, 'prefix'>;

export const ATTRIBUTE_NAMES: readonly AttributeName[] = [
  'prefix',
  'nextHop',
  'communities',
  'localPreference',
  'metric',
  'weight',
  'tag',
  'asPath',
];

export function isAttributeName(value: unknown): value is AttributeName {
  return typeof value === 'string' && (ATTRIBUTE_NAMES as readonly string[]).includes(value);
}

export type Comparator = 'EQ' | 'GE' | 'GT' | 'LE' | 'LT';

export const COMPARATORS: readonly Comparator[] = ['EQ', 'GE', 'GT', 'LE', 'LT'];

export type Disposition = 'accept' | 'reject' | 'pass';

/**
 * Fields shared by every parsed node. `nativeClass` holds the namespace-
 * qualified class name a document used, so it can be written back as read.
 */
export interface NodeBase {
  readonly nativeClass?: string;
}

// -- literals ---------------------------------------------------------------

export interface BoolNode extends NodeBase {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface IntNode extends NodeBase {
  readonly kind: 'int';
  readonly value: number;
}

export interface IpNode extends NodeBase {
  readonly kind: 'ip';
  readonly address: string;
}

export interface NetworkNode extends NodeBase {
  readonly kind: 'network';
  readonly prefix: string;
}

export interface CommunitySetNode extends NodeBase {
  readonly kind: 'communitySet';
  readonly communities: readonly string[];
}

export interface AsPathNode extends NodeBase {
  readonly kind: 'asPath';
  readonly asns: readonly number[];
}

// -- references and operators ---------------------------------------------

export interface AttrNode extends NodeBase {
  readonly kind: 'attr';
  readonly attribute: AttributeName;
}

export interface AndNode extends NodeBase {
  readonly kind: 'and';
  readonly operands: readonly Expr[];
}

export interface OrNode extends NodeBase {
  readonly kind: 'or';
  readonly operands: readonly Expr[];
}

export interface NotNode extends NodeBase {
  readonly kind: 'not';
  readonly operand: Expr;
}

export interface CompareNode extends NodeBase {
  readonly kind: 'compare';
  readonly comparator: Comparator;
  readonly left: Expr;
  readonly right: Expr;
}

export interface MatchCommunityNode extends NodeBase {
  readonly kind: 'matchCommunity';
  readonly communities: Expr;
  readonly community: string;
}

export interface MatchPrefixNode extends NodeBase {
  readonly kind: 'matchPrefix';
  readonly prefix: Expr;
  readonly ranges: readonly string[];
  /** Qualified class of the nested prefix set, when the document qualified it. */
  readonly setClass?: string;
}

export interface UnionNode extends NodeBase {
  readonly kind: 'union';
  readonly operands: readonly Expr[];
}

export interface PrependNode extends NodeBase {
  readonly kind: 'prepend';
  readonly asns: readonly number[];
  readonly operand: Expr;
}

/** Whether another policy of the same node accepts the route. */
export interface CallNode extends NodeBase {
  readonly kind: 'call';
  readonly policy: string;
}

/** The route's local preference raised or lowered by a fixed amount. */
export interface AdjustLocalPrefNode extends NodeBase {
  readonly kind: 'adjustLocalPref';
  readonly op: 'increment' | 'decrement';
  readonly amount: number;
}

/** Prefix match against a named prefix list declared on the node. */
export interface MatchNamedPrefixNode extends NodeBase {
  readonly kind: 'matchNamedPrefix';
  readonly prefix: Expr;
  readonly name: string;
  readonly setClass?: string;
}

/** A community set declared on the node, by name. */
export interface CommunityRefNode extends NodeBase {
  readonly kind: 'communityRef';
  readonly name: string;
}

/** A construct outside the known vocabulary, kept verbatim. */
export interface UnsupportedNode {
  readonly kind: 'unsupported';
  readonly tag: string;
  readonly raw: JsonObject;
}

export type LiteralExpr = BoolNode | IntNode | IpNode | NetworkNode | CommunitySetNode | AsPathNode;

export type Expr =
  | LiteralExpr
  | AttrNode
  | AndNode
  | OrNode
  | NotNode
  | CompareNode
  | MatchCommunityNode
  | MatchPrefixNode
  | UnionNode
  | PrependNode
  | CallNode
  | AdjustLocalPrefNode
  | MatchNamedPrefixNode
  | CommunityRefNode
  | UnsupportedNode;

export type ExprKind = Expr['kind'];

// -- statements --------------------------------------------------------------

export interface IfStatement extends NodeBase {
  readonly kind: 'if';
  readonly guard: Expr;
  readonly trueBranch: readonly Statement[];
  readonly falseBranch: readonly Statement[];
  /** `null` when the document carried an explicit null comment. */
  readonly comment?: string | null;
}

export interface SetStatement extends NodeBase {
  readonly kind: 'set';
  readonly attribute: SettableAttribute;
  readonly value: Expr;
}

export interface ReturnStatement extends NodeBase {
  readonly kind: 'return';
  readonly disposition: Disposition;
}

export type Statement = IfStatement | SetStatement | ReturnStatement;

export interface Policy {
  readonly name: string;
  readonly statements: readonly Statement[];
}

// -- constructors ------------------------------------------------------------

export const bool = (value: boolean): BoolNode => ({ kind: 'bool', value });
export const int = (value: number): IntNode => ({ kind: 'int', value });
export const ip = (address: string): IpNode => ({ kind: 'ip', address });
export const network = (prefix: string): NetworkNode => ({ kind: 'network', prefix });
export const communitySet = (communities: readonly string[]): CommunitySetNode => ({
  kind: 'communitySet',
  communities,
});
export const asPath = (asns: readonly number[]): AsPathNode => ({ kind: 'asPath', asns });
export const attr = (attribute: AttributeName): AttrNode => ({ kind: 'attr', attribute });
export const and = (...operands: Expr[]): AndNode => ({ kind: 'and', operands });
export const or = (...operands: Expr[]): OrNode => ({ kind: 'or', operands });
export const not = (operand: Expr): NotNode => ({ kind: 'not', operand });
export const compare = (comparator: Comparator, left: Expr, right: Expr): CompareNode => ({
  kind: 'compare',
  comparator,
  left,
  right,
});
export const matchCommunity = (community: string, communities: Expr = attr('communities')): MatchCommunityNode => ({
  kind: 'matchCommunity',
  communities,
  community,
});
export const matchPrefix = (ranges: readonly string[], prefix: Expr = attr('prefix')): MatchPrefixNode => ({
  kind: 'matchPrefix',
  prefix,
  ranges,
});
export const union = (...operands: Expr[]): UnionNode => ({ kind: 'union', operands });
export const prepend = (asns: readonly number[], operand: Expr = attr('asPath')): PrependNode => ({
  kind: 'prepend',
  asns,
  operand,
});
export const call = (policy: string): CallNode => ({ kind: 'call', policy });
export const adjustLocalPref = (op: 'increment' | 'decrement', amount: number): AdjustLocalPrefNode => ({
  kind: 'adjustLocalPref',
  op,
  amount,
});
export const matchNamedPrefix = (name: string, prefix: Expr = attr('prefix')): MatchNamedPrefixNode => ({
  kind: 'matchNamedPrefix',
  prefix,
  name,
});
export const communityRef = (name: string): CommunityRefNode => ({ kind: 'communityRef', name });

export const ifStmt = (
  guard: Expr,
  trueBranch: readonly Statement[],
  falseBranch: readonly Statement[] = [],
  comment?: string | null,
): IfStatement =>
  comment === undefined
    ? { kind: 'if', guard, trueBranch, falseBranch }
    : { kind: 'if', guard, trueBranch, falseBranch, comment };
export const setStmt = (attribute: SettableAttribute, value: Expr): SetStatement => ({ kind: 'set', attribute, value });
export const ret = (disposition: Disposition): ReturnStatement => ({ kind: 'return', disposition });

// -- generic walking ---------------------------------------------------------

export function isLiteral(expr: Expr): expr is LiteralExpr {
  switch (expr.kind) {
    case 'bool':
    case 'int':
    case 'ip':
    case 'network':
    case 'communitySet':
    case 'asPath':
      return true;
    default:
      return false;
  }
}

/**
 * The direct sub-expressions of a node, in field order.
 */
export function exprChildren(expr: Expr): readonly Expr[] {
  switch (expr.kind) {
    case 'bool':
    case 'int':
    case 'ip':
    case 'network':
    case 'communitySet':
    case 'asPath':
    case 'attr':
    case 'call':
    case 'adjustLocalPref':
    case 'communityRef':
    case 'unsupported':
      return [];
    case 'and':
    case 'or':
    case 'union':
      return expr.operands;
    case 'not':
    case 'prepend':
      return [expr.operand];
    case 'compare':
      return [expr.left, expr.right];
    case 'matchCommunity':
      return [expr.communities];
    case 'matchPrefix':
    case 'matchNamedPrefix':
      return [expr.prefix];
  }
}

/**
 * Rebuild a node with every direct child replaced by `f(child)`. The
 * native class and other annotations carry over.
 */
export function mapChildren(expr: Expr, f: (child: Expr) => Expr): Expr {
  switch (expr.kind) {
    case 'bool':
    case 'int':
    case 'ip':
    case 'network':
    case 'communitySet':
    case 'asPath':
    case 'attr':
    case 'call':
    case 'adjustLocalPref':
    case 'communityRef':
    case 'unsupported':
      return expr;
    case 'and':
    case 'or':
    case 'union':
      return { ...expr, operands: expr.operands.map(f) };
    case 'not':
    case 'prepend':
      return { ...expr, operand: f(expr.operand) };
    case 'compare':
      return { ...expr, left: f(expr.left), right: f(expr.right) };
    case 'matchCommunity':
      return { ...expr, communities: f(expr.communities) };
    case 'matchPrefix':
    case 'matchNamedPrefix':
      return { ...expr, prefix: f(expr.prefix) };
  }
}

/** Node count. */
export function exprSize(expr: Expr): number {
  return exprChildren(expr).reduce((total, child) => total + exprSize(child), 1);
}

export function exprDepth(expr: Expr): number {
  return 1 + Math.max(0, ...exprChildren(expr).map(exprDepth));
}

export function statementsSize(statements: readonly Statement[]): number {
  let total = 0;
  for (const stmt of statements) {
    switch (stmt.kind) {
      case 'if':
        total += 1 + exprSize(stmt.guard) + statementsSize(stmt.trueBranch) + statementsSize(stmt.falseBranch);
        break;
      case 'set':
        total += 1 + exprSize(stmt.value);
        break;
      case 'return':
        total += 1;
        break;
    }
  }
  return total;
}

/** Every attribute referenced anywhere in the tree. */
export function referencedAttributes(expr: Expr): Set<AttributeName> {
  const found = new Set<AttributeName>();
  const visit = (node: Expr): void => {
    if (node.kind === 'attr') found.add(node.attribute);
    if (node.kind === 'adjustLocalPref') found.add('localPreference');
    exprChildren(node).forEach(visit);
  };
  visit(expr);
  return found;
}

function sameList<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((x, i) => eq(x, b[i]));
}

const strictEq = <T>(x: T, y: T): boolean => x === y;

export function exprEquals(a: Expr, b: Expr): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'bool':
    case 'int':
      return b.kind === a.kind && b.value === a.value;
    case 'ip':
      return b.kind === 'ip' && b.address === a.address;
    case 'network':
      return b.kind === 'network' && b.prefix === a.prefix;
    case 'communitySet':
      return b.kind === 'communitySet' && sameList(a.communities, b.communities, strictEq);
    case 'asPath':
      return b.kind === 'asPath' && sameList(a.asns, b.asns, strictEq);
    case 'attr':
      return b.kind === 'attr' && b.attribute === a.attribute;
    case 'and':
    case 'or':
    case 'union':
      return b.kind === a.kind && sameList(a.operands, b.operands, exprEquals);
    case 'not':
      return b.kind === 'not' && exprEquals(a.operand, b.operand);
    case 'prepend':
      return b.kind === 'prepend' && sameList(a.asns, b.asns, strictEq) && exprEquals(a.operand, b.operand);
    case 'compare':
      return (
        b.kind === 'compare' &&
        b.comparator === a.comparator &&
        exprEquals(a.left, b.left) &&
        exprEquals(a.right, b.right)
      );
    case 'matchCommunity':
      return b.kind === 'matchCommunity' && b.community === a.community && exprEquals(a.communities, b.communities);
    case 'matchPrefix':
      return b.kind === 'matchPrefix' && sameList(a.ranges, b.ranges, strictEq) && exprEquals(a.prefix, b.prefix);
    case 'call':
      return b.kind === 'call' && b.policy === a.policy;
    case 'adjustLocalPref':
      return b.kind === 'adjustLocalPref' && b.op === a.op && b.amount === a.amount;
    case 'matchNamedPrefix':
      return b.kind === 'matchNamedPrefix' && b.name === a.name && exprEquals(a.prefix, b.prefix);
    case 'communityRef':
      return b.kind === 'communityRef' && b.name === a.name;
    case 'unsupported':
      return b.kind === 'unsupported' && b.tag === a.tag && JSON.stringify(b.raw) === JSON.stringify(a.raw);
  }
}

export function statementEquals(a: Statement, b: Statement): boolean {
  switch (a.kind) {
    case 'if':
      return (
        b.kind === 'if' &&
        b.comment === a.comment &&
        exprEquals(a.guard, b.guard) &&
        statementsEqual(a.trueBranch, b.trueBranch) &&
        statementsEqual(a.falseBranch, b.falseBranch)
      );
    case 'set':
      return b.kind === 'set' && b.attribute === a.attribute && exprEquals(a.value, b.value);
    case 'return':
      return b.kind === 'return' && b.disposition === a.disposition;
  }
}

export function statementsEqual(a: readonly Statement[], b: readonly Statement[]): boolean {
  return sameList(a, b, statementEquals);
}

/** Names of the policies a list of statements calls, in first-use order. */
export function calledPolicies(statements: readonly Statement[]): string[] {
  const found: string[] = [];
  const visit = (node: Expr): void => {
    if (node.kind === 'call' && !found.includes(node.policy)) found.push(node.policy);
    exprChildren(node).forEach(visit);
  };
  const walk = (block: readonly Statement[]): void => {
    for (const stmt of block) {
      switch (stmt.kind) {
        case 'if':
          visit(stmt.guard);
          walk(stmt.trueBranch);
          walk(stmt.falseBranch);
          break;
        case 'set':
          visit(stmt.value);
          break;
        case 'return':
          break;
      }
    }
  };
  walk(statements);
  return found;
}
