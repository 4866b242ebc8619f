import { describe, it, expect } from 'vitest';
import {
  adjustLocalPref,
  and,
  attr,
  bool,
  call,
  calledPolicies,
  compare,
  exprChildren,
  exprDepth,
  exprEquals,
  exprSize,
  ifStmt,
  int,
  isLiteral,
  mapChildren,
  matchCommunity,
  matchNamedPrefix,
  not,
  or,
  referencedAttributes,
  ret,
  setStmt,
  statementsEqual,
  statementsSize,
} from '../../src/compiler/ast.js';

const guard = and(matchCommunity('65000:1'), not(compare('GT', attr('metric'), int(10))));

describe('expression helpers', () => {
  it('counts nodes and depth', () => {
    // and, matchCommunity, attr, not, compare, attr, int
    expect(exprSize(guard)).toBe(7);
    expect(exprDepth(guard)).toBe(4);
    expect(exprDepth(bool(true))).toBe(1);
  });

  it('lists children in field order', () => {
    expect(exprChildren(compare('EQ', attr('tag'), int(3)))).toEqual([attr('tag'), int(3)]);
    expect(exprChildren(int(3))).toEqual([]);
  });

  it('rebuilds a node with mapped children', () => {
    const replaced = mapChildren(or(bool(true), bool(false)), () => attr('weight'));
    expect(replaced).toEqual(or(attr('weight'), attr('weight')));
  });

  it('collects referenced attributes', () => {
    expect([...referencedAttributes(guard)].sort()).toEqual(['communities', 'metric']);
    expect([...referencedAttributes(adjustLocalPref('increment', 5))]).toEqual(['localPreference']);
  });

  it('walks into named prefix matches', () => {
    expect(exprChildren(matchNamedPrefix('customers'))).toEqual([attr('prefix')]);
    expect(exprEquals(matchNamedPrefix('customers'), matchNamedPrefix('peers'))).toBe(false);
  });

  it('ignores the native class when comparing', () => {
    expect(exprEquals({ ...bool(true), nativeClass: 'org.example.StaticBooleanExpr' }, bool(true))).toBe(true);
  });

  it('tells literals from operators', () => {
    expect(isLiteral(int(1))).toBe(true);
    expect(isLiteral(attr('metric'))).toBe(false);
  });

  it('compares structurally', () => {
    expect(exprEquals(guard, and(matchCommunity('65000:1'), not(compare('GT', attr('metric'), int(10)))))).toBe(true);
    expect(exprEquals(guard, and(matchCommunity('65000:2'), not(compare('GT', attr('metric'), int(10)))))).toBe(false);
    expect(exprEquals(bool(true), int(1))).toBe(false);
  });
});

describe('statement helpers', () => {
  const statements = [ifStmt(guard, [setStmt('metric', int(5))], [ret('reject')]), ret('accept')];

  it('measures statements', () => {
    // if (1) + guard (7) + set (1 + 1) + return (1), then return (1)
    expect(statementsSize(statements)).toBe(12);
  });

  it('compares statements including comments', () => {
    expect(statementsEqual(statements, [ifStmt(guard, [setStmt('metric', int(5))], [ret('reject')]), ret('accept')])).toBe(
      true,
    );
    expect(statementsEqual([ifStmt(guard, [], [], 'x')], [ifStmt(guard, [], [])])).toBe(false);
  });

  it('lists called policies once each, in order', () => {
    const calling = [
      ifStmt(and(call('is-customer'), call('is-peer')), [ret('accept')], [setStmt('metric', int(1))]),
      ifStmt(call('is-customer'), [ret('reject')]),
    ];
    expect(calledPolicies(calling)).toEqual(['is-customer', 'is-peer']);
    expect(calledPolicies(statements)).toEqual([]);
  });
});
