/**
 * Route records: immutable maps from route attributes to slots.
 *
 * A slot holds either a literal (the attribute's concrete value) or a
 * residual expression over the input route's attributes. A fresh symbolic
 * record maps every attribute to a reference to itself.
 *
 * @module interpreter/route-record
 */

import {
  ATTRIBUTE_NAMES,
  attr,
  isLiteral,
  type AttributeName,
  type Expr,
  type JsonObject,
  type JsonValue,
} from '../compiler/ast.js';
import { literalValue } from '../compiler/evaluator.js';
import { serializeExpression } from '../compiler/serializer.js';
import { InterpretError, QueryError } from '../core/errors.js';
import { isCommunity, parseAddress, parsePrefix } from '../network/ipv4.js';

export interface RouteAttributes {
  prefix?: string;
  nextHop?: string;
  communities?: readonly string[];
  localPreference?: number;
  metric?: number;
  weight?: number;
  tag?: number;
  asPath?: readonly number[];
}

export interface RouteRecordOptions {
  /** Leave unspecified attributes symbolic (default) instead of absent. */
  symbolic?: boolean;
}

function integerSlot(name: AttributeName, value: number): Expr {
  if (!Number.isSafeInteger(value)) {
    throw new QueryError(`Route attribute '${name}' must be an integer`);
  }
  return { kind: 'int', value };
}

function concreteSlot(name: AttributeName, values: RouteAttributes): Expr | undefined {
  switch (name) {
    case 'prefix': {
      const value = values.prefix;
      if (value === undefined) return undefined;
      if (!value.includes('/') || parsePrefix(value) === null) {
        throw new QueryError(`Invalid route prefix '${value}'`);
      }
      return { kind: 'network', prefix: value };
    }
    case 'nextHop': {
      const value = values.nextHop;
      if (value === undefined) return undefined;
      if (parseAddress(value) === null) throw new QueryError(`Invalid next hop '${value}'`);
      return { kind: 'ip', address: value };
    }
    case 'communities': {
      const value = values.communities;
      if (value === undefined) return undefined;
      const bad = value.find((c) => !isCommunity(c));
      if (bad !== undefined) throw new QueryError(`Invalid community '${bad}'`);
      return { kind: 'communitySet', communities: [...value] };
    }
    case 'asPath': {
      const value = values.asPath;
      if (value === undefined) return undefined;
      if (!value.every((asn) => Number.isInteger(asn) && asn >= 0)) {
        throw new QueryError('Route AS path must hold non-negative integers');
      }
      return { kind: 'asPath', asns: [...value] };
    }
    case 'localPreference':
    case 'metric':
    case 'weight':
    case 'tag': {
      const value = values[name];
      return value === undefined ? undefined : integerSlot(name, value);
    }
  }
}

export class RouteRecord {
  private readonly slots: ReadonlyMap<AttributeName, Expr>;

  private constructor(slots: ReadonlyMap<AttributeName, Expr>) {
    this.slots = slots;
  }

  /** Every listed attribute mapped to its own placeholder. */
  static symbolic(attributes: readonly AttributeName[] = ATTRIBUTE_NAMES): RouteRecord {
    return new RouteRecord(new Map(attributes.map((name) => [name, attr(name)])));
  }

  /**
   * A record holding the given concrete values. Attributes not given are
   * symbolic, or absent with `{ symbolic: false }`.
   *
   * @throws QueryError on a malformed value
   */
  static from(values: RouteAttributes, options: RouteRecordOptions = {}): RouteRecord {
    const symbolic = options.symbolic ?? true;
    const slots = new Map<AttributeName, Expr>();
    for (const name of ATTRIBUTE_NAMES) {
      const slot = concreteSlot(name, values);
      if (slot) slots.set(name, slot);
      else if (symbolic) slots.set(name, attr(name));
    }
    return new RouteRecord(slots);
  }

  has(attribute: AttributeName): boolean {
    return this.slots.has(attribute);
  }

  /**
   * @throws InterpretError if the attribute is not part of this record
   */
  lookup(attribute: AttributeName): Expr {
    const slot = this.slots.get(attribute);
    if (slot === undefined) {
      throw new InterpretError(`Route attribute '${attribute}' is not defined`);
    }
    return slot;
  }

  /**
   * A copy with one slot replaced.
   *
   * @throws InterpretError if the attribute is not part of this record
   */
  with(attribute: AttributeName, value: Expr): RouteRecord {
    if (!this.slots.has(attribute)) {
      throw new InterpretError(`Cannot assign undefined route attribute '${attribute}'`);
    }
    const slots = new Map(this.slots);
    slots.set(attribute, value);
    return new RouteRecord(slots);
  }

  attributes(): AttributeName[] {
    return [...this.slots.keys()];
  }

  isConcrete(attribute: AttributeName): boolean {
    const slot = this.slots.get(attribute);
    return slot !== undefined && isLiteral(slot);
  }

  /** Concrete slots as plain values, residual slots in native encoding. */
  toJSON(): JsonObject {
    const out: JsonObject = {};
    for (const [name, slot] of this.slots) {
      out[name] = isLiteral(slot) ? toJsonValue(literalValue(slot)) : serializeExpression(slot);
    }
    return out;
  }
}

function toJsonValue(value: boolean | number | string | readonly string[] | readonly number[]): JsonValue {
  return typeof value === 'object' ? [...value] : value;
}
