import { describe, expect, it } from "vitest";
import { type Generator } from "../src/dl.js";
import { InvariantViolation } from "../src/misc.js";
import { ValueIndex } from "../src/value-index.js";

describe('ValueIndex', () => {
  it('binds at the first occurrence and references after', () => {
    const index = new ValueIndex();
    index.addOccurrence('X', { level: 0, element: 1 });
    index.addOccurrence('X', { level: 2, element: 0 });
    index.addOccurrence('Y', { level: 1, element: 0 });

    expect(index.lookup('X')).toEqual({ level: 0, element: 1 });
    expect(index.occurrences('X')).toEqual([{ level: 0, element: 1 }, { level: 2, element: 0 }]);
    expect(index.isBound('Y')).toBe(true);
    expect(index.isBound('Z')).toBe(false);
    expect(index.occurrences('Z')).toEqual([]);
  });

  it('rejects binding twice', () => {
    const index = new ValueIndex();
    index.bind('X', { level: 0, element: 0 });
    expect(() => index.bind('X', { level: 1, element: 0 })).toThrow(
      'Internal error: variable X is already bound');
  });

  it('rejects references to unbound variables', () => {
    const index = new ValueIndex();
    expect(() => index.reference('X', { level: 0, element: 0 })).toThrow(InvariantViolation);
  });

  it('rejects lookups of ungrounded variables', () => {
    expect(() => new ValueIndex().lookup('X')).toThrow('Internal error: variable X is not grounded');
  });

  it('locates generators by identity', () => {
    const index = new ValueIndex();
    const range: Generator = { type: 'functor', op: 'range', args: [] };
    const sameLooking: Generator = { type: 'functor', op: 'range', args: [] };
    index.setGeneratorLocation(range, { level: 3, element: 0 });

    expect(index.generatorLocation(range)).toEqual({ level: 3, element: 0 });
    expect(index.isGenerator(range)).toBe(true);
    expect(index.isGenerator(sameLooking)).toBe(false);
    expect(() => index.generatorLocation(sameLooking)).toThrow('generator range() is not indexed');
    expect(() => index.setGeneratorLocation(range, { level: 4, element: 0 })).toThrow(
      'generator range() is already indexed');
  });
});
