import * as DL from './dl.js';
import { invariant } from './misc.js';


// Where a value becomes available in the operation tree: element `element` of
// the tuple bound at nesting level `level` (t<level>.<element>).
export type Location = {
  level: number,
  element: number,
}

export function sameLocation(loc1: Location, loc2: Location): boolean {
  return loc1.level === loc2.level && loc1.element === loc2.element;
}

// Tracks, for a single clause translation, where each variable is bound and
// where each generator (aggregator or multi-result functor) puts its result.
//
// A variable is bound at its first occurrence; every later occurrence is
// recorded as a reference so that it can be equated with the binding.
export class ValueIndex {
  private variableOccurrences = new Map<string, Location[]>();
  private generatorLocations = new Map<DL.Generator, Location>();

  bind(variable: string, location: Location): void {
    invariant(!this.variableOccurrences.has(variable), () =>
      `variable ${variable} is already bound`);
    this.variableOccurrences.set(variable, [location]);
  }

  reference(variable: string, location: Location): void {
    const occurrences = this.variableOccurrences.get(variable);
    invariant(occurrences, () => `variable ${variable} referenced before being bound`);
    occurrences.push(location);
  }

  // Binds on first sight, references afterwards.
  addOccurrence(variable: string, location: Location): void {
    if (this.isBound(variable)) {
      this.reference(variable, location);
    } else {
      this.bind(variable, location);
    }
  }

  isBound(variable: string): boolean {
    return this.variableOccurrences.has(variable);
  }

  lookup(variable: string): Location {
    const occurrences = this.variableOccurrences.get(variable);
    invariant(occurrences, () => `variable ${variable} is not grounded`);
    return occurrences[0];
  }

  // Binding first, then references in the order they were recorded.
  occurrences(variable: string): Location[] {
    return [...this.variableOccurrences.get(variable) ?? []];
  }

  setGeneratorLocation(generator: DL.Generator, location: Location): void {
    invariant(!this.generatorLocations.has(generator), () =>
      `generator ${DL.argumentToString(generator)} is already indexed`);
    this.generatorLocations.set(generator, location);
  }

  generatorLocation(generator: DL.Generator): Location {
    const location = this.generatorLocations.get(generator);
    invariant(location, () => `generator ${DL.argumentToString(generator)} is not indexed`);
    return location;
  }

  isGenerator(arg: DL.Argument): boolean {
    return DL.isGenerator(arg) && this.generatorLocations.has(arg);
  }
}
