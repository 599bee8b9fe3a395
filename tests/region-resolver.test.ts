import { describe, expect, it } from 'vitest';
import { GLOBAL_REGION, RegionResolver } from '../src/modules/nlp/region-resolver.js';
import { UnknownRegionError } from '../src/utils/errors.js';
import { fixtureData } from './fixtures.js';

describe('RegionResolver', () => {
  const resolver = new RegionResolver(fixtureData());

  describe('normalize', () => {
    it('maps adjectives and aliases to canonical regions', () => {
      expect(resolver.normalize('European countries')).toBe('Europe');
      expect(resolver.normalize('the EU')).toBe('Europe');
      expect(resolver.normalize('South-East Asian nations')).toBe('Southeast Asia');
      expect(resolver.normalize('Latin American cities')).toBe('South America');
      expect(resolver.normalize('worldwide')).toBe(GLOBAL_REGION);
    });

    it('prefers the more specific alias', () => {
      expect(resolver.normalize('ASEAN and Southeast Asia')).toBe('ASEAN');
      expect(resolver.normalize('south asia')).toBe('South Asia');
    });

    it('returns undefined when no region is named', () => {
      expect(resolver.normalize('Thailand in 2027')).toBeUndefined();
    });
  });

  describe('resolve', () => {
    it('returns the same set for a region and its adjective', () => {
      expect([...resolver.resolve('European')]).toEqual([...resolver.resolve('Europe')]);
      expect([...resolver.resolve('Europe')]).toEqual(['France']);
    });

    it('normalises member names through the synonym table', () => {
      expect([...resolver.resolve('ASEAN')].sort()).toEqual(['Laos', 'Thailand', 'Vietnam']);
    });

    it('is idempotent', () => {
      const first = [...resolver.resolve('Southeast Asia')];
      const second = [...resolver.resolve('Southeast Asia')];
      expect(second).toEqual(first);
    });

    it('resolves Global to every country with data', () => {
      expect([...resolver.resolve('Global')].sort()).toEqual(['France', 'Japan', 'Laos', 'Thailand', 'Vietnam']);
    });

    it('rejects unsupported regions with the supported list', () => {
      expect(() => resolver.resolve('Antarctica')).toThrow(UnknownRegionError);
      try {
        resolver.resolve('Antarctica');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownRegionError);
        if (error instanceof UnknownRegionError) {
          expect(error.supportedRegions).toEqual(['ASEAN', 'Africa', 'East Asia', 'Europe', 'Southeast Asia']);
          expect(error.message).toContain('Supported regions: ASEAN, Africa, East Asia, Europe, Southeast Asia');
        }
      }
    });

    it('never returns an empty set for a region without data', () => {
      expect(() => resolver.resolve('Africa')).toThrow('No pollution data is available for any country in Africa');
    });
  });

  describe('scope', () => {
    it('uses an explicit list of two or more countries first', () => {
      expect(resolver.scope({ region: 'Europe', countries: ['Vietnam', 'Japan'] })).toEqual({
        label: 'Vietnam, Japan',
        countries: ['Japan', 'Vietnam'],
      });
    });

    it('falls back to the region, then to Global', () => {
      expect(resolver.scope({ region: 'East Asia', countries: ['Thailand'] })).toEqual({
        label: 'East Asia',
        countries: ['Japan'],
      });
      expect(resolver.scope({}).label).toBe(GLOBAL_REGION);
      expect(resolver.scope({}).countries).toHaveLength(5);
    });
  });

  it('finds the first region listing a country', () => {
    expect(resolver.homeRegion('Thailand')).toBe('Southeast Asia');
    expect(resolver.homeRegion('France')).toBe('Europe');
    expect(resolver.homeRegion('Narnia')).toBeUndefined();
  });
});
