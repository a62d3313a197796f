import { describe, it, expect } from '@jest/globals';
import {
  INTERFACE_METHODS,
  InvalidArgumentError,
  assertVerb,
  isVerb,
  normalizeSubjects,
} from '../../src/index.js';

describe('verb registry', () => {
  it('accepts every administrative verb', () => {
    for (const verb of INTERFACE_METHODS) {
      expect(assertVerb(verb)).toBe(verb);
    }
    expect(INTERFACE_METHODS).toHaveLength(7);
  });

  it('rejects anything outside the whitelist', () => {
    expect(() => assertVerb('sleep')).toThrow(InvalidArgumentError);
    expect(() => assertVerb('sleep')).toThrow('Invalid method sleep to apply');
    expect(isVerb('LIST')).toBe(false);
    expect(isVerb(42)).toBe(false);
  });
});

describe('target selection', () => {
  it('keeps the all and signed keywords', () => {
    expect(normalizeSubjects('all')).toBe('all');
    expect(normalizeSubjects('signed')).toBe('signed');
  });

  it('copies host lists in order', () => {
    const hosts = ['web02', 'web01'];
    const normalized = normalizeSubjects(hosts);
    expect(normalized).toEqual(['web02', 'web01']);
    expect(normalized).not.toBe(hosts);
  });

  it('turns an empty host list into no selection', () => {
    expect(normalizeSubjects([])).toBeUndefined();
  });

  it('rejects other shapes', () => {
    expect(() => normalizeSubjects('everything')).toThrow(
      "Subjects must be an array or 'all'; not everything",
    );
    expect(() => normalizeSubjects(['web01', 3])).toThrow(InvalidArgumentError);
    expect(() => normalizeSubjects(undefined)).toThrow(
      "Subjects must be an array or 'all'; not undefined",
    );
  });
});
