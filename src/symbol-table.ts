// Interns symbols (string constants) as dense numeric indices, which is how
// they travel through RAM.

export class SymbolTable {
  private symbolToIndex = new Map<string, number>();
  private indexToSymbol: string[] = [];

  constructor(symbols: Iterable<string> = []) {
    for (const symbol of symbols) {
      this.encode(symbol);
    }
  }

  encode(symbol: string): number {
    const existing = this.symbolToIndex.get(symbol);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.indexToSymbol.length;
    this.indexToSymbol.push(symbol);
    this.symbolToIndex.set(symbol, index);
    return index;
  }

  decode(index: number): string {
    const symbol = this.indexToSymbol[index];
    if (symbol === undefined) {
      throw new Error(`Unknown symbol index ${index}`);
    }
    return symbol;
  }

  get size(): number {
    return this.indexToSymbol.length;
  }
}
