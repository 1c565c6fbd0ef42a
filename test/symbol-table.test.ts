import { describe, expect, it } from "vitest";
import { SymbolTable } from "../src/symbol-table.js";

describe('SymbolTable', () => {
  it('numbers symbols in order of first use', () => {
    const table = new SymbolTable(['a', 'b', 'a']);
    expect(table.size).toBe(2);
    expect(table.encode('c')).toBe(2);
    expect(table.encode('a')).toBe(0);
    expect(table.decode(1)).toBe('b');
  });

  it('rejects unknown indices', () => {
    expect(() => new SymbolTable().decode(0)).toThrow('Unknown symbol index 0');
  });
});
