import { describe, it, expect } from 'vitest';
import { evaluateConcrete, literalValue, partialEvaluate } from '../../src/compiler/evaluator.js';
import {
  adjustLocalPref,
  and,
  asPath,
  attr,
  bool,
  call,
  communityRef,
  communitySet,
  compare,
  int,
  matchCommunity,
  matchNamedPrefix,
  matchPrefix,
  network,
  not,
  or,
  prepend,
  union,
  type Expr,
} from '../../src/compiler/ast.js';
import { InterpretError } from '../../src/core/errors.js';
import { RouteRecord } from '../../src/interpreter/route-record.js';

const tagged = matchCommunity('65000:1');

describe('partialEvaluate', () => {
  describe('concrete routes', () => {
    it('decides community matches', () => {
      expect(partialEvaluate(tagged, RouteRecord.from({ communities: ['65000:1'] }))).toEqual(bool(true));
      expect(partialEvaluate(tagged, RouteRecord.from({ communities: ['65000:2'] }))).toEqual(bool(false));
    });

    it('decides prefix matches', () => {
      const record = RouteRecord.from({ prefix: '10.0.2.0/24' });
      expect(partialEvaluate(matchPrefix(['10.0.0.0/8:16-24']), record)).toEqual(bool(true));
      expect(partialEvaluate(matchPrefix(['10.0.0.0/8']), record)).toEqual(bool(false));
    });

    it('computes set and path values', () => {
      const record = RouteRecord.from({ communities: ['65000:1'], asPath: [65002] });
      expect(partialEvaluate(union(attr('communities'), communitySet(['65000:5'])), record)).toEqual(
        communitySet(['65000:1', '65000:5']),
      );
      expect(partialEvaluate(prepend([65001]), record)).toEqual(asPath([65001, 65002]));
    });
  });

  describe('symbolic routes', () => {
    it('returns a residual over the unknown attributes', () => {
      const expr = and(tagged, compare('GE', attr('localPreference'), int(100)));
      expect(partialEvaluate(expr, RouteRecord.from({ localPreference: 150 }))).toEqual(tagged);
      expect(partialEvaluate(expr, RouteRecord.from({ localPreference: 50 }))).toEqual(bool(false));
    });

    it('leaves a fully symbolic expression unchanged apart from simplification', () => {
      const expr = or(not(not(tagged)), bool(false));
      expect(partialEvaluate(expr, RouteRecord.symbolic())).toEqual(tagged);
    });

    it('substitutes assigned residuals', () => {
      const record = RouteRecord.symbolic().with('asPath', prepend([65001]));
      expect(partialEvaluate(prepend([65002]), record)).toEqual(prepend([65002, 65001]));
    });
  });

  describe('errors', () => {
    it('rejects unsupported constructs', () => {
      const expr: Expr = and(tagged, { kind: 'unsupported', tag: 'MatchTag', raw: { class: 'MatchTag' } });
      expect(() => partialEvaluate(expr, RouteRecord.symbolic())).toThrow(InterpretError);
      expect(() => partialEvaluate(expr, RouteRecord.symbolic())).toThrow(
        "Cannot evaluate unsupported construct 'MatchTag'",
      );
    });

    it('rejects attributes missing from the record', () => {
      const record = RouteRecord.from({ prefix: '10.0.0.0/8' }, { symbolic: false });
      expect(() => partialEvaluate(tagged, record)).toThrow("Route attribute 'communities' is not defined");
    });

    it('rejects operands of the wrong type', () => {
      const expr = compare('EQ', attr('communities'), int(1));
      expect(() => partialEvaluate(expr, RouteRecord.symbolic())).toThrow(
        'Type mismatch in compare: expected integer, got communities',
      );
    });
  });
});

describe('local preference adjustment', () => {
  it('folds into a concrete value', () => {
    const record = RouteRecord.from({ localPreference: 100 });
    expect(partialEvaluate(adjustLocalPref('increment', 20), record)).toEqual(int(120));
    expect(partialEvaluate(adjustLocalPref('decrement', 150), record)).toEqual(int(-50));
  });

  it('stays relative to a symbolic value', () => {
    expect(partialEvaluate(adjustLocalPref('decrement', 10), RouteRecord.symbolic())).toEqual(
      adjustLocalPref('decrement', 10),
    );
  });

  it('combines with an earlier adjustment', () => {
    const raised = RouteRecord.symbolic().with('localPreference', adjustLocalPref('increment', 30));

    expect(partialEvaluate(adjustLocalPref('decrement', 50), raised)).toEqual(adjustLocalPref('decrement', 20));
    expect(partialEvaluate(adjustLocalPref('decrement', 30), raised)).toEqual(attr('localPreference'));
  });

  it('rejects a local preference of another kind', () => {
    const odd = RouteRecord.symbolic().with('localPreference', tagged);
    expect(() => partialEvaluate(adjustLocalPref('increment', 1), odd)).toThrow(
      "Cannot adjust a local preference of kind 'matchCommunity'",
    );
  });
});

describe('references and calls', () => {
  it('rejects references that were never inlined', () => {
    expect(() => partialEvaluate(matchNamedPrefix('customers'), RouteRecord.symbolic())).toThrow(
      "Unresolved prefix list 'customers'",
    );
    expect(() => partialEvaluate(union(communityRef('ours')), RouteRecord.symbolic())).toThrow(
      "Unresolved community set 'ours'",
    );
  });

  it('needs an environment to evaluate a call', () => {
    expect(() => partialEvaluate(call('is-customer'), RouteRecord.symbolic())).toThrow(InterpretError);
    expect(() => partialEvaluate(call('is-customer'), RouteRecord.symbolic())).toThrow(
      "Cannot evaluate call to policy 'is-customer' here",
    );
  });

  it('substitutes the result of the environment call', () => {
    const seen: string[] = [];
    const env = {
      call: (policy: string) => {
        seen.push(policy);
        return bool(false);
      },
    };

    expect(partialEvaluate(or(call('is-customer'), tagged), RouteRecord.symbolic(), env)).toEqual(tagged);
    expect(evaluateConcrete(not(call('is-peer')), RouteRecord.symbolic(), env)).toEqual(bool(true));
    expect(seen).toEqual(['is-customer', 'is-peer']);
  });
});

describe('evaluateConcrete', () => {
  it('returns the literal result', () => {
    const record = RouteRecord.from({ metric: 20 });
    expect(evaluateConcrete(compare('LT', attr('metric'), int(50)), record)).toEqual(bool(true));
  });

  it('fails when the result is still symbolic', () => {
    expect(() => evaluateConcrete(tagged, RouteRecord.symbolic())).toThrow(
      "Expression of kind 'matchCommunity' depends on symbolic route attributes",
    );
  });
});

describe('literalValue', () => {
  it('unwraps each literal kind', () => {
    expect(literalValue(bool(false))).toBe(false);
    expect(literalValue(int(7))).toBe(7);
    expect(literalValue(network('10.0.0.0/8'))).toBe('10.0.0.0/8');
    expect(literalValue(communitySet(['65000:1']))).toEqual(['65000:1']);
    expect(literalValue(asPath([65001]))).toEqual([65001]);
  });
});
