/**
 * Parser from the analysis service's native policy encoding to the AST.
 *
 * Every native object carries its constructor name in a `class` field. Names
 * may be namespace-qualified (`a.b.Conjunction`, `Outer$Inner`); only the
 * final segment is significant, but a qualified name is kept on the node as
 * `nativeClass` so the serializer can write it back unchanged.
 *
 * @module compiler/parser
 */

import { ParseError } from '../core/errors.js';
import { isCommunity, parseAddress, parsePrefix, parsePrefixRange } from '../network/ipv4.js';
import {
  COMPARATORS,
  isAttributeName,
  type Comparator,
  type Disposition,
  type Expr,
  type JsonObject,
  type JsonValue,
  type Policy,
  type SettableAttribute,
  type Statement,
} from './ast.js';

export interface ParseOptions {
  /** Keep unknown expression tags as `unsupported` nodes instead of failing. */
  keepUnsupported?: boolean;
}

/** Native `set` statement tags and the field holding the assigned value. */
export const SET_TAGS: Readonly<Record<SettableAttribute, { tag: string; field: string }>> = {
  localPreference: { tag: 'SetLocalPreference', field: 'localPreference' },
  metric: { tag: 'SetMetric', field: 'metric' },
  weight: { tag: 'SetWeight', field: 'weight' },
  tag: { tag: 'SetTag', field: 'tag' },
  communities: { tag: 'SetCommunities', field: 'communitySetExpr' },
  nextHop: { tag: 'SetNextHop', field: 'expr' },
  asPath: { tag: 'SetAsPath', field: 'asPath' },
};

export const RETURN_TYPES: Readonly<Record<Disposition, string>> = {
  accept: 'ExitAccept',
  reject: 'ExitReject',
  pass: 'FallThrough',
};

const MAX_ASN = 4294967295;

/**
 * Strip the namespace from a native tag: `org.x.BooleanExprs$StaticBooleanExpr`
 * becomes `StaticBooleanExpr`.
 */
export function parseQualifiedTag(tag: string): string {
  const afterDot = tag.slice(tag.lastIndexOf('.') + 1);
  return afterDot.slice(afterDot.lastIndexOf('$') + 1);
}

// ============================================================================
// Field access
// ============================================================================

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ParseError('Expected an object', path);
  }
  return value;
}

function field(obj: JsonObject, key: string, path: string): JsonValue {
  const value = obj[key];
  if (value === undefined) {
    throw new ParseError(`Missing required field '${key}'`, path);
  }
  return value;
}

function stringField(obj: JsonObject, key: string, path: string): string {
  const value = field(obj, key, path);
  if (typeof value !== 'string') {
    throw new ParseError(`Field '${key}' must be a string`, join(path, key));
  }
  return value;
}

function integerField(obj: JsonObject, key: string, path: string): number {
  const value = field(obj, key, path);
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new ParseError(`Field '${key}' must be an integer`, join(path, key));
  }
  return value;
}

function arrayField(obj: JsonObject, key: string, path: string): JsonValue[] {
  const value = field(obj, key, path);
  if (!Array.isArray(value)) {
    throw new ParseError(`Field '${key}' must be an array`, join(path, key));
  }
  return value;
}

function stringList(obj: JsonObject, key: string, path: string, check: (s: string) => boolean, what: string): string[] {
  return arrayField(obj, key, path).map((item, i) => {
    const itemPath = `${join(path, key)}[${i}]`;
    if (typeof item !== 'string' || !check(item)) {
      throw new ParseError(`Invalid ${what} ${JSON.stringify(item)}`, itemPath);
    }
    return item;
  });
}

function asnList(obj: JsonObject, key: string, path: string): number[] {
  return arrayField(obj, key, path).map((item, i) => {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 0 || item > MAX_ASN) {
      throw new ParseError(`Invalid AS number ${JSON.stringify(item)}`, `${join(path, key)}[${i}]`);
    }
    return item;
  });
}

function tagOf(obj: JsonObject, path: string): string {
  return parseQualifiedTag(stringField(obj, 'class', path));
}

function qualifiedClass(obj: JsonObject): string | undefined {
  const name = obj['class'];
  return typeof name === 'string' && name !== parseQualifiedTag(name) ? name : undefined;
}

function keepClass<T extends Expr | Statement>(obj: JsonObject, node: T): T {
  const nativeClass = qualifiedClass(obj);
  return nativeClass === undefined ? node : { ...node, nativeClass };
}

// ============================================================================
// Expressions
// ============================================================================

function operandList(obj: JsonObject, key: string, path: string, options: ParseOptions): Expr[] {
  const items = arrayField(obj, key, path);
  if (items.length === 0) {
    throw new ParseError(`Field '${key}' must not be empty`, join(path, key));
  }
  return items.map((item, i) => parseExpression(item, options, `${join(path, key)}[${i}]`));
}

function parseComparator(obj: JsonObject, path: string): Comparator {
  const value = stringField(obj, 'comparator', path);
  const comparator = COMPARATORS.find((c) => c === value);
  if (!comparator) {
    throw new ParseError(`Unknown comparator '${value}'`, join(path, 'comparator'));
  }
  return comparator;
}

function parseMatchPrefix(obj: JsonObject, options: ParseOptions, path: string): Expr {
  const prefix = parseExpression(field(obj, 'prefix', path), options, join(path, 'prefix'));
  const setPath = join(path, 'prefixSet');
  const set = expectObject(field(obj, 'prefixSet', path), setPath);
  const tag = tagOf(set, setPath);
  const setClass = qualifiedClass(set);
  if (tag === 'NamedPrefixSet') {
    const name = stringField(set, 'name', setPath);
    return setClass === undefined
      ? { kind: 'matchNamedPrefix', prefix, name }
      : { kind: 'matchNamedPrefix', prefix, name, setClass };
  }
  if (tag !== 'ExplicitPrefixSet') {
    throw new ParseError(`Unsupported prefix set '${tag}'`, setPath);
  }
  const ranges = stringList(set, 'prefixSpace', setPath, (s) => parsePrefixRange(s) !== null, 'prefix range');
  return setClass === undefined ? { kind: 'matchPrefix', prefix, ranges } : { kind: 'matchPrefix', prefix, ranges, setClass };
}

function amountField(obj: JsonObject, key: string, path: string): number {
  const value = integerField(obj, key, path);
  if (value < 0) throw new ParseError(`Field '${key}' must not be negative`, join(path, key));
  return value;
}

/**
 * Parse one native expression object.
 *
 * @throws ParseError on an unknown tag (unless `keepUnsupported`), a missing
 *   or ill-typed field, or a malformed community, prefix or address.
 */
export function parseExpression(json: unknown, options: ParseOptions = {}, path = ''): Expr {
  const obj = expectObject(json, path);
  const expr = parseExpressionNode(obj, tagOf(obj, path), options, path);
  // unsupported nodes keep the whole raw object, class included
  return expr.kind === 'unsupported' ? expr : keepClass(obj, expr);
}

function parseExpressionNode(obj: JsonObject, tag: string, options: ParseOptions, path: string): Expr {
  switch (tag) {
    case 'StaticBooleanExpr': {
      const type = stringField(obj, 'type', path);
      if (type !== 'True' && type !== 'False') {
        throw new ParseError(`Unknown boolean constant '${type}'`, join(path, 'type'));
      }
      return { kind: 'bool', value: type === 'True' };
    }
    case 'LiteralLong':
      return { kind: 'int', value: integerField(obj, 'value', path) };
    case 'RouteAttribute': {
      const attribute = stringField(obj, 'attribute', path);
      if (!isAttributeName(attribute)) {
        throw new ParseError(`Unknown route attribute '${attribute}'`, join(path, 'attribute'));
      }
      return { kind: 'attr', attribute };
    }
    case 'Conjunction':
      return { kind: 'and', operands: operandList(obj, 'conjuncts', path, options) };
    case 'Disjunction':
      return { kind: 'or', operands: operandList(obj, 'disjuncts', path, options) };
    case 'Not':
      return { kind: 'not', operand: parseExpression(field(obj, 'expr', path), options, join(path, 'expr')) };
    case 'IntComparison':
      return {
        kind: 'compare',
        comparator: parseComparator(obj, path),
        left: parseExpression(field(obj, 'left', path), options, join(path, 'left')),
        right: parseExpression(field(obj, 'right', path), options, join(path, 'right')),
      };
    case 'MatchCommunity': {
      const community = stringField(obj, 'community', path);
      if (!isCommunity(community)) {
        throw new ParseError(`Invalid community '${community}'`, join(path, 'community'));
      }
      return {
        kind: 'matchCommunity',
        communities: parseExpression(field(obj, 'communitySetExpr', path), options, join(path, 'communitySetExpr')),
        community,
      };
    }
    case 'MatchPrefixSet':
      return parseMatchPrefix(obj, options, path);
    case 'LiteralCommunitySet':
      return { kind: 'communitySet', communities: stringList(obj, 'communitySet', path, isCommunity, 'community') };
    case 'CommunitySetUnion':
      return { kind: 'union', operands: operandList(obj, 'exprs', path, options) };
    case 'LiteralIp': {
      const address = stringField(obj, 'ip', path);
      if (parseAddress(address) === null) {
        throw new ParseError(`Invalid address '${address}'`, join(path, 'ip'));
      }
      return { kind: 'ip', address };
    }
    case 'LiteralPrefix': {
      const prefix = stringField(obj, 'prefix', path);
      if (!prefix.includes('/') || parsePrefix(prefix) === null) {
        throw new ParseError(`Invalid prefix '${prefix}'`, join(path, 'prefix'));
      }
      return { kind: 'network', prefix };
    }
    case 'LiteralAsPath':
      return { kind: 'asPath', asns: asnList(obj, 'asns', path) };
    case 'PrependAsPath':
      return {
        kind: 'prepend',
        asns: asnList(obj, 'asns', path),
        operand: parseExpression(field(obj, 'expr', path), options, join(path, 'expr')),
      };
    case 'CallExpr':
      return { kind: 'call', policy: stringField(obj, 'calledPolicyName', path) };
    case 'IncrementLocalPreference':
      return { kind: 'adjustLocalPref', op: 'increment', amount: amountField(obj, 'addend', path) };
    case 'DecrementLocalPreference':
      return { kind: 'adjustLocalPref', op: 'decrement', amount: amountField(obj, 'subtrahend', path) };
    case 'CommunitySetReference':
      return { kind: 'communityRef', name: stringField(obj, 'name', path) };
    default:
      if (options.keepUnsupported) {
        return { kind: 'unsupported', tag, raw: obj };
      }
      throw new ParseError(`Unsupported expression '${tag}'`, path);
  }
}

// ============================================================================
// Statements
// ============================================================================

export function parseStatements(json: unknown, options: ParseOptions = {}, path = ''): Statement[] {
  if (!Array.isArray(json)) {
    throw new ParseError('Expected an array of statements', path);
  }
  return json.map((item, i) => parseStatement(item, options, `${path}[${i}]`));
}

function parseSet(attribute: SettableAttribute, obj: JsonObject, options: ParseOptions, path: string): Statement {
  const key = SET_TAGS[attribute].field;
  return {
    kind: 'set',
    attribute,
    value: parseExpression(field(obj, key, path), options, join(path, key)),
  };
}

/**
 * Parse one native statement object. Unknown statement tags are always an
 * error; only expressions may be kept as `unsupported`.
 */
export function parseStatement(json: unknown, options: ParseOptions = {}, path = ''): Statement {
  const obj = expectObject(json, path);
  return keepClass(obj, parseStatementNode(obj, tagOf(obj, path), options, path));
}

function parseStatementNode(obj: JsonObject, tag: string, options: ParseOptions, path: string): Statement {
  if (tag === 'If') {
    const rawComment = obj['comment'];
    let comment: string | null | undefined;
    if (rawComment === undefined || rawComment === null || typeof rawComment === 'string') {
      comment = rawComment;
    } else {
      throw new ParseError("Field 'comment' must be a string or null", join(path, 'comment'));
    }
    const guard = parseExpression(field(obj, 'guard', path), options, join(path, 'guard'));
    const trueBranch = parseStatements(field(obj, 'trueStatements', path), options, join(path, 'trueStatements'));
    const falseBranch = parseStatements(field(obj, 'falseStatements', path), options, join(path, 'falseStatements'));
    return comment === undefined
      ? { kind: 'if', guard, trueBranch, falseBranch }
      : { kind: 'if', guard, trueBranch, falseBranch, comment };
  }

  if (tag === 'StaticStatement') {
    const type = stringField(obj, 'type', path);
    for (const [disposition, name] of Object.entries(RETURN_TYPES)) {
      if (name === type && isDisposition(disposition)) {
        return { kind: 'return', disposition };
      }
    }
    throw new ParseError(`Unknown static statement '${type}'`, join(path, 'type'));
  }

  for (const [attribute, setter] of Object.entries(SET_TAGS)) {
    if (setter.tag === tag && isAttributeName(attribute) && attribute !== 'prefix') {
      return parseSet(attribute, obj, options, path);
    }
  }

  throw new ParseError(`Unsupported statement '${tag}'`, path);
}

function isDisposition(value: string): value is Disposition {
  return value === 'accept' || value === 'reject' || value === 'pass';
}

/**
 * Parse a native `{ name, statements }` routing policy.
 */
export function parsePolicy(json: unknown, options: ParseOptions = {}, path = ''): Policy {
  const obj = expectObject(json, path);
  const name = stringField(obj, 'name', path);
  const statements = parseStatements(field(obj, 'statements', path), options, join(path, 'statements'));
  return { name, statements };
}
