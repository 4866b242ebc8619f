import { describe, it, expect } from 'vitest';
import { RouteRecord } from '../../src/interpreter/route-record.js';
import { attr, communitySet, int, network, prepend } from '../../src/compiler/ast.js';
import { InterpretError, QueryError } from '../../src/core/errors.js';

describe('RouteRecord', () => {
  describe('symbolic', () => {
    it('maps every attribute to itself', () => {
      const record = RouteRecord.symbolic();
      expect(record.attributes()).toEqual([
        'prefix',
        'nextHop',
        'communities',
        'localPreference',
        'metric',
        'weight',
        'tag',
        'asPath',
      ]);
      expect(record.lookup('metric')).toEqual(attr('metric'));
      expect(record.isConcrete('metric')).toBe(false);
    });

    it('can be limited to some attributes', () => {
      const record = RouteRecord.symbolic(['communities']);
      expect(record.has('communities')).toBe(true);
      expect(record.has('metric')).toBe(false);
    });
  });

  describe('from', () => {
    it('holds concrete values and leaves the rest symbolic', () => {
      const record = RouteRecord.from({ prefix: '10.0.2.0/24', communities: ['65000:1'], localPreference: 100 });
      expect(record.lookup('prefix')).toEqual(network('10.0.2.0/24'));
      expect(record.lookup('communities')).toEqual(communitySet(['65000:1']));
      expect(record.lookup('localPreference')).toEqual(int(100));
      expect(record.lookup('weight')).toEqual(attr('weight'));
      expect(record.isConcrete('prefix')).toBe(true);
    });

    it('omits unspecified attributes when not symbolic', () => {
      const record = RouteRecord.from({ metric: 5 }, { symbolic: false });
      expect(record.attributes()).toEqual(['metric']);
    });

    it('rejects malformed values', () => {
      expect(() => RouteRecord.from({ prefix: '10.0.0.0' })).toThrow(QueryError);
      expect(() => RouteRecord.from({ prefix: '10.0.0.1/8' })).toThrow("Invalid route prefix '10.0.0.1/8'");
      expect(() => RouteRecord.from({ communities: ['65000:1', 'no'] })).toThrow("Invalid community 'no'");
      expect(() => RouteRecord.from({ nextHop: '300.0.0.1' })).toThrow("Invalid next hop '300.0.0.1'");
      expect(() => RouteRecord.from({ metric: 1.5 })).toThrow("Route attribute 'metric' must be an integer");
      expect(() => RouteRecord.from({ asPath: [-3] })).toThrow('Route AS path must hold non-negative integers');
    });
  });

  describe('lookup and with', () => {
    it('fails on an attribute outside the record', () => {
      const record = RouteRecord.from({}, { symbolic: false });
      expect(() => record.lookup('tag')).toThrow(InterpretError);
      expect(() => record.lookup('tag')).toThrow("Route attribute 'tag' is not defined");
      expect(() => record.with('tag', int(1))).toThrow("Cannot assign undefined route attribute 'tag'");
    });

    it('returns a new record and leaves the original untouched', () => {
      const original = RouteRecord.symbolic();
      const updated = original.with('asPath', prepend([65001]));
      expect(updated.lookup('asPath')).toEqual(prepend([65001]));
      expect(original.lookup('asPath')).toEqual(attr('asPath'));
    });
  });

  describe('toJSON and key', () => {
    it('writes literals as plain values and residuals in native form', () => {
      const record = RouteRecord.from({ communities: ['65000:1'], localPreference: 100 }, { symbolic: false }).with(
        'localPreference',
        attr('metric'),
      );
      expect(record.toJSON()).toEqual({
        communities: ['65000:1'],
        localPreference: { class: 'RouteAttribute', attribute: 'metric' },
      });
    });
  });
});
