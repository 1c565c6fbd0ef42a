import _ from 'lodash';
import * as DL from './dl.js';
import { invariant } from './misc.js';


// What the clause translator needs to know about the rest of the program.
// Everything here comes from earlier analyses and is read-only while clauses
// are being translated.
export interface TranslatorContext {
  // Number of trailing provenance columns (rule number, heights) of the
  // atom's relation.
  getEvaluationArity(atom: DL.Atom): number;
  isFact(clause: DL.Clause): boolean;
  isRule(clause: DL.Clause): boolean;
  isRecursive(relation: DL.QualifiedName): boolean;
  inSameScc(relation1: DL.QualifiedName, relation2: DL.QualifiedName): boolean;
  concreteName(relation: DL.QualifiedName): string;
}

export function deltaName(concreteName: string): string {
  return `@delta_${concreteName}`;
}

export function newName(concreteName: string): string {
  return `@new_${concreteName}`;
}

export type TranslatorContextOptions = {
  // Keyed by concrete relation name; relations not listed have none.
  auxiliaryArities: Record<string, number>,
}

// A context computed directly from the clauses of a program: relations are
// recursive when they sit on a cycle of the dependency graph (positive,
// negated and aggregated body atoms all count as dependencies).
export function mkTranslatorContext(
  clauses: DL.Clause[],
  optionsIn?: Partial<TranslatorContextOptions>,
): TranslatorContext {
  const options: TranslatorContextOptions = { auxiliaryArities: optionsIn?.auxiliaryArities ?? {} };

  const graph = new Map<string, Set<string>>();
  function node(name: string): Set<string> {
    let deps = graph.get(name);
    if (!deps) {
      deps = new Set();
      graph.set(name, deps);
    }
    return deps;
  }
  for (const clause of clauses) {
    const deps = node(DL.qualifiedNameToString(clause.head.name));
    for (const dep of dependencies(clause.body)) {
      deps.add(dep);
      node(dep);
    }
  }

  const sccOf = new Map<string, number>();
  const recursive = new Set<string>();
  tarjan(graph).forEach((scc, i) => {
    for (const name of scc) {
      sccOf.set(name, i);
    }
    const only = scc[0];
    if (scc.length > 1 || node(only).has(only)) {
      scc.forEach((name) => recursive.add(name));
    }
  });

  return {
    getEvaluationArity(atom) {
      const arity = options.auxiliaryArities[DL.qualifiedNameToString(atom.name)] ?? 0;
      invariant(arity <= atom.args.length, () =>
        `auxiliary arity ${arity} of ${DL.atomToString(atom)} exceeds its arity ${atom.args.length}`);
      return arity;
    },
    isFact(clause) {
      return clause.body.length === 0;
    },
    isRule(clause) {
      return clause.body.length > 0;
    },
    isRecursive(relation) {
      return recursive.has(DL.qualifiedNameToString(relation));
    },
    inSameScc(relation1, relation2) {
      const scc1 = sccOf.get(DL.qualifiedNameToString(relation1));
      return scc1 !== undefined && scc1 === sccOf.get(DL.qualifiedNameToString(relation2));
    },
    concreteName(relation) {
      return DL.qualifiedNameToString(relation);
    },
  };
}

function dependencies(literals: DL.Literal[]): string[] {
  const deps: string[] = [];
  for (const lit of literals) {
    if (lit.type === 'atom') {
      deps.push(DL.qualifiedNameToString(lit.name));
    } else if (lit.type === 'negation') {
      deps.push(DL.qualifiedNameToString(lit.atom.name));
    }
  }
  DL.visitArguments(literals, (arg) => {
    if (arg.type === 'aggregator') {
      deps.push(...dependencies(arg.body));
    }
  });
  return _.uniq(deps);
}

// Strongly connected components, in reverse topological order.
function tarjan(graph: Map<string, Set<string>>): string[][] {
  let nextIndex = 0;
  const index = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const sccs: string[][] = [];

  function strongConnect(v: string): number {
    const vIndex = nextIndex++;
    index.set(v, vIndex);
    let low = vIndex;
    stack.push(v);
    onStack.add(v);

    for (const w of graph.get(v) ?? []) {
      const wIndex = index.get(w);
      if (wIndex === undefined) {
        low = Math.min(low, strongConnect(w));
      } else if (onStack.has(w)) {
        low = Math.min(low, wIndex);
      }
    }

    if (low === vIndex) {
      const scc: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        invariant(w !== undefined, 'SCC stack underflow');
        onStack.delete(w);
        scc.push(w);
      } while (w !== v);
      sccs.push(scc);
    }
    return low;
  }

  for (const v of graph.keys()) {
    if (!index.has(v)) {
      strongConnect(v);
    }
  }
  return sccs;
}
