import _ from 'lodash';
import inspect from 'object-inspect';
import { type TranslatorConfig } from './config.js';
import * as DL from './dl.js';
import { assertNever, invariant } from './misc.js';
import * as RAM from './ram.js';
import { type SymbolTable } from './symbol-table.js';
import { deltaName, newName, type TranslatorContext } from './translator-context.js';
import { sameLocation, ValueIndex } from './value-index.js';
import { lowerConstraint, lowerValue, type ValueScope } from './value-translator.js';


// a little orientation: a rule is lowered to a loop nest. Every positive body
// atom gets a nesting level (a scan), in body order, so the first atom is the
// outermost loop; generators (aggregators and multi-result functors) get the
// levels after that. Inside all of it sits the head action. We build the nest
// inside-out, one stage at a time, each stage wrapping the tree it is given.

export type Environment = {
  context: TranslatorContext,
  symbolTable: SymbolTable,
  config: TranslatorConfig,
}

export type Level =
  | { type: 'atom', atom: DL.AtomLiteral }
  | { type: 'generator', generator: DL.Generator }

export type ClauseScope = Environment & ValueScope & {
  clause: DL.Clause,
  version: number,
  // Positive body atoms whose relation is in the head's SCC. Version `v`
  // reads the delta of `sccAtoms[v]`.
  sccAtoms: SccAtom[],
  isRecursive: boolean,
  levels: Level[],
}

// Wraps `nested` in a check that `atom` does not hold. `isDelta` asks for the
// check against the atom's delta relation.
export type NegationBuilder =
  (atom: DL.Atom, nested: RAM.Operation, isDelta: boolean, scope: ClauseScope) => RAM.Operation;

// A recursive body atom together with its scan level, which is also its
// position among the body's positive atoms.
export type SccAtom = {
  atom: DL.AtomLiteral,
  level: number,
}

// What differs between the plain and the provenance translation.
export type ClauseTranslatorStrategy = {
  factOperation: (scope: ClauseScope) => RAM.Operation,
  ruleOperation: (scope: ClauseScope) => RAM.Operation,
  negate: NegationBuilder,
  // Skip the clause, and stop scanning, once a nullary head holds.
  guardNullaryHead: boolean,
}

type Stage = (op: RAM.Operation, scope: ClauseScope, strategy: ClauseTranslatorStrategy) => RAM.Operation;

export class TranslationError extends Error {
  constructor(public clause: DL.Clause, public version: number, public cause: unknown) {
    const message = cause instanceof Error ? cause.message : inspect(cause);
    super(`Error translating ${DL.clauseToString(clause)} (version ${version}): ${message}`, { cause });
    if (cause instanceof Error) { this.stack = cause.stack; }
  }
}

export function translateClause(
  clause: DL.Clause,
  version: number,
  env: Environment,
  strategy: ClauseTranslatorStrategy = baseStrategy,
): RAM.Statement {
  try {
    if (env.context.isFact(clause)) {
      invariant(version === 0, () => `facts only have version 0, got ${version}`);
      return translateFact(clause, env, strategy);
    }
    return translateRule(clause, version, env, strategy);
  } catch (e) {
    throw new TranslationError(clause, version, e);
  }
}

// One statement per semi-naive version: one for each SCC atom of a recursive
// rule, otherwise just version 0.
export function translateClauseVersions(
  clause: DL.Clause,
  env: Environment,
  strategy: ClauseTranslatorStrategy = baseStrategy,
): RAM.Statement[] {
  return _.range(versionCount(clause, env.context))
    .map((version) => translateClause(clause, version, env, strategy));
}

export function versionCount(clause: DL.Clause, context: TranslatorContext): number {
  return Math.max(1, sccAtoms(clause, context).length);
}

export function sccAtoms(clause: DL.Clause, context: TranslatorContext): SccAtom[] {
  return DL.bodyAtoms(clause.body).flatMap((atom, level) =>
    context.inSameScc(clause.head.name, atom.name) ? [{ atom, level }] : []);
}

export function translateFact(
  clause: DL.Clause,
  env: Environment,
  strategy: ClauseTranslatorStrategy = baseStrategy,
): RAM.Statement {
  invariant(env.context.isFact(clause), () => `clause should be a fact: ${DL.clauseToString(clause)}`);
  const scope = mkClauseScope(clause, 0, env);
  return { type: 'query', operation: strategy.factOperation(scope) };
}

export function translateRule(
  clause: DL.Clause,
  version: number,
  env: Environment,
  strategy: ClauseTranslatorStrategy = baseStrategy,
): RAM.Statement {
  invariant(env.context.isRule(clause), () => `clause should be a rule: ${DL.clauseToString(clause)}`);
  const scope = mkClauseScope(clause, version, env);
  if (scope.isRecursive) {
    invariant(Number.isInteger(version) && version >= 0 && version < scope.sccAtoms.length, () =>
      `version ${version} out of range for a rule with ${scope.sccAtoms.length} recursive atoms`);
  } else {
    invariant(version === 0, () => `non-recursive rules only have version 0, got ${version}`);
  }

  indexClause(scope);

  const stages: Stage[] = [
    addBodyLiteralConstraints,
    addGeneratorLevels,
    addVariableIntroductions,
    ...(strategy.guardNullaryHead ? [addEntryPoint] : []),
  ];
  const operation = stages.reduce(
    (op, stage) => stage(op, scope, strategy),
    strategy.ruleOperation(scope),
  );
  return { type: 'query', operation };
}

function mkClauseScope(clause: DL.Clause, version: number, env: Environment): ClauseScope {
  const atoms = sccAtoms(clause, env.context);
  return {
    ...env,
    index: new ValueIndex(),
    clause,
    version,
    sccAtoms: atoms,
    isRecursive: atoms.length > 0,
    levels: [],
  };
}

// Recursive clauses write their new tuples aside.
export function headRelationName(scope: ClauseScope): RAM.RelationName {
  const name = scope.context.concreteName(scope.clause.head.name);
  return scope.isRecursive ? newName(name) : name;
}

// The relation scanned at `level`: the delta for the version's own recursive
// atom, the full relation otherwise.
export function bodyAtomRelationName(scope: ClauseScope, atom: DL.Atom, level: number): RAM.RelationName {
  const name = scope.context.concreteName(atom.name);
  if (scope.isRecursive && scope.sccAtoms[scope.version].level === level) {
    return deltaName(name);
  }
  return name;
}


/************
 * INDEXING *
 ************/

function addLevel(scope: ClauseScope, level: Level): number {
  scope.levels.push(level);
  return scope.levels.length - 1;
}

function indexClause(scope: ClauseScope): void {
  const { clause, index } = scope;

  for (const atom of DL.bodyAtoms(clause.body)) {
    const level = addLevel(scope, { type: 'atom', atom });
    atom.args.forEach((arg, element) => {
      if (arg.type === 'variable') {
        index.addOccurrence(arg.name, { level, element });
      }
    });
  }

  DL.visitArguments([{ type: 'atom', ...clause.head }, ...clause.body], (arg) => {
    if (arg.type === 'aggregator') {
      indexAggregator(scope, arg);
    } else if (DL.isMultiResultFunctor(arg)) {
      const level = addLevel(scope, { type: 'generator', generator: arg });
      index.setGeneratorLocation(arg, { level, element: 0 });
    }
  });

  // `X = <generator>` makes the generator's result a place X can be bound.
  for (const lit of clause.body) {
    if (lit.type !== 'constraint' || lit.op !== '=') { continue; }
    if (lit.lhs.type === 'variable' && index.isGenerator(lit.rhs)) {
      bindToGenerator(scope, lit.lhs.name, lit.rhs);
    } else if (lit.rhs.type === 'variable' && index.isGenerator(lit.lhs)) {
      bindToGenerator(scope, lit.rhs.name, lit.lhs);
    }
  }
}

function bindToGenerator(scope: ClauseScope, variable: string, generator: DL.Argument): void {
  invariant(DL.isGenerator(generator), () => `${DL.argumentToString(generator)} is not a generator`);
  scope.index.addOccurrence(variable, scope.index.generatorLocation(generator));
}

function indexAggregator(scope: ClauseScope, agg: DL.Argument & { type: 'aggregator' }): void {
  const aggAtoms = DL.bodyAtoms(agg.body);
  invariant(aggAtoms.length === 1, () =>
    `aggregator body should have exactly one atom: ${DL.argumentToString(agg)}`);
  const rejectGenerator = (arg: DL.Argument) => {
    invariant(!DL.isGenerator(arg), () =>
      `generators nested in aggregators should have been materialized: ${DL.argumentToString(agg)}`);
  };
  if (agg.target) { DL.visitArgument(agg.target, rejectGenerator); }
  DL.visitArguments(agg.body, rejectGenerator);

  const level = addLevel(scope, { type: 'generator', generator: agg });
  scope.index.setGeneratorLocation(agg, { level, element: 0 });
  aggAtoms[0].args.forEach((arg, element) => {
    if (arg.type === 'variable') {
      scope.index.addOccurrence(arg.name, { level, element });
    }
  });
}


/*******************************
 * STAGE: LITERAL CONSTRAINTS *
 *******************************/

// Binary constraints innermost, then negations; first literal outermost.
// Recursive rules also skip tuples already known (negated head) and tuples a
// later version will produce from its own delta.
const addBodyLiteralConstraints: Stage = (op, scope, strategy) => {
  const { clause } = scope;
  const reversedBody = [...clause.body].reverse();

  for (const lit of reversedBody) {
    if (lit.type === 'constraint') {
      op = RAM.filter(lowerConstraint(lit, scope), op);
    }
  }
  for (const lit of reversedBody) {
    if (lit.type === 'negation') {
      op = strategy.negate(lit.atom, op, false, scope);
    }
  }

  if (scope.isRecursive) {
    if (clause.head.args.length > 0) {
      op = strategy.negate(clause.head, op, false, scope);
    }
    for (let i = scope.sccAtoms.length - 1; i > scope.version; i--) {
      op = strategy.negate(scope.sccAtoms[i].atom, op, true, scope);
    }
  }
  return op;
};

export function negationCondition(atom: DL.Atom, isDelta: boolean, scope: ClauseScope): RAM.Condition {
  const auxiliaryArity = scope.context.getEvaluationArity(atom);
  invariant(auxiliaryArity <= atom.args.length, () =>
    `auxiliary arity ${auxiliaryArity} out of bounds for ${DL.atomToString(atom)}`);
  const arity = atom.args.length - auxiliaryArity;
  const name = scope.context.concreteName(atom.name);
  const relation = isDelta ? deltaName(name) : name;

  if (arity === 0) {
    // for a nullary relation, non-existence is plain emptiness
    return { type: 'emptiness-check', relation };
  }
  const values: RAM.Expression[] = [
    ...atom.args.slice(0, arity).map((arg) => lowerValue(arg, scope)),
    ..._.times(auxiliaryArity, (): RAM.Expression => ({ type: 'undef-value' })),
  ];
  return RAM.negation({ type: 'existence-check', relation, values });
}

export const addNegate: NegationBuilder = (atom, nested, isDelta, scope) =>
  RAM.filter(negationCondition(atom, isDelta, scope), nested);


/**************************
 * STAGE: GENERATOR LEVELS *
 **************************/

const addGeneratorLevels: Stage = (op, scope) => {
  for (let level = scope.levels.length - 1; level >= 0; level--) {
    const current = scope.levels[level];
    if (current.type !== 'generator') { continue; }
    const { generator } = current;
    switch (generator.type) {
      case 'aggregator':
        op = instantiateAggregator(op, generator, level, scope);
        break;
      case 'functor':
        op = {
          type: 'nested-intrinsic-operator',
          op: generator.op,
          args: generator.args.map((arg) => lowerValue(arg, scope)),
          level,
          nested: op,
        };
        break;
      default:
        assertNever(generator);
    }
  }
  return op;
};

function instantiateAggregator(
  op: RAM.Operation,
  agg: DL.Argument & { type: 'aggregator' },
  level: number,
  scope: ClauseScope,
): RAM.Operation {
  let condition: RAM.Condition | undefined;

  for (const lit of agg.body) {
    if (lit.type === 'constraint') {
      condition = RAM.conjoin(condition, lowerConstraint(lit, scope));
    } else if (lit.type === 'negation') {
      condition = RAM.conjoin(condition, negationCondition(lit.atom, false, scope));
    }
  }

  const [aggAtom] = DL.bodyAtoms(agg.body);
  aggAtom.args.forEach((arg, element) => {
    const here = { level, element };
    if (arg.type === 'variable') {
      // equate with some other occurrence, never with this column itself
      const other = scope.index.occurrences(arg.name).find((loc) => !sameLocation(loc, here));
      if (other) {
        condition = RAM.conjoin(condition,
          RAM.equals(RAM.tupleElement(level, element), RAM.tupleElement(other.level, other.element)));
      }
    } else {
      const value = lowerValue(arg, scope);
      if (value.type !== 'undef-value') {
        condition = RAM.conjoin(condition, RAM.equals(RAM.tupleElement(level, element), value));
      }
    }
  });

  return {
    type: 'aggregate',
    fn: agg.fn,
    relation: scope.context.concreteName(aggAtom.name),
    expression: agg.target ? lowerValue(agg.target, scope) : { type: 'undef-value' },
    condition: condition ?? { type: 'true' },
    level,
    nested: op,
  };
}


/*********************************
 * STAGE: VARIABLE INTRODUCTIONS *
 *********************************/

const addVariableIntroductions: Stage = (op, scope, strategy) => {
  for (let level = scope.levels.length - 1; level >= 0; level--) {
    const current = scope.levels[level];
    if (current.type === 'atom') {
      op = addAtomScan(op, current.atom, level, scope, strategy);
    }
  }
  return op;
};

function addAtomScan(
  op: RAM.Operation,
  atom: DL.AtomLiteral,
  level: number,
  scope: ClauseScope,
  strategy: ClauseTranslatorStrategy,
): RAM.Operation {
  const { head } = scope.clause;
  const relation = bodyAtomRelationName(scope, atom, level);

  // Checks on this atom's own columns go directly inside its scan.
  const conditions = atom.args.flatMap((arg, element) => argumentCondition(arg, level, element, scope) ?? []);
  op = conditions.reduceRight((nested, condition) => RAM.filter(condition, nested), op);

  if (atom.args.length === 0 || atom.args.every((arg) => arg.type === 'unnamed-variable')) {
    return RAM.filter(RAM.negation({ type: 'emptiness-check', relation }), op);
  }
  if (head.args.length === 0 && strategy.guardNullaryHead) {
    op = {
      type: 'break',
      condition: RAM.negation({ type: 'emptiness-check', relation: headRelationName(scope) }),
      nested: op,
    };
  }
  return { type: 'scan', relation, level, nested: op };
}

function argumentCondition(
  arg: DL.Argument,
  level: number,
  element: number,
  scope: ClauseScope,
): RAM.Condition | undefined {
  const here = RAM.tupleElement(level, element);
  switch (arg.type) {
    case 'unnamed-variable':
      return undefined;
    case 'variable': {
      const binding = scope.index.lookup(arg.name);
      if (sameLocation(binding, { level, element })) {
        return undefined;
      }
      return RAM.equals(RAM.tupleElement(binding.level, binding.element), here);
    }
    case 'aggregator':
    case 'number':
    case 'string':
    case 'functor':
    case 'user-functor':
    case 'counter':
    case 'subroutine-argument': {
      invariant(!DL.isGenerator(arg), () =>
        `generator ${DL.argumentToString(arg)} used as an atom argument; bind it to a variable first`);
      const value = lowerValue(arg, scope);
      invariant(levelsOf(value).every((l) => l <= level), () =>
        `${DL.argumentToString(arg)} depends on values bound inside the scan of level ${level}`);
      return RAM.equals(here, value);
    }
    default:
      assertNever(arg);
  }
}

function levelsOf(exp: RAM.Expression): number[] {
  switch (exp.type) {
    case 'tuple-element':
      return [exp.level];
    case 'intrinsic-operator':
    case 'user-defined-operator':
      return exp.args.flatMap(levelsOf);
    case 'signed-constant':
    case 'unsigned-constant':
    case 'float-constant':
    case 'undef-value':
    case 'auto-increment':
    case 'subroutine-argument':
      return [];
    default:
      assertNever(exp);
  }
}


/**********************
 * STAGE: ENTRY POINT *
 **********************/

// A nullary head holds at most one tuple; once it is there, skip the clause.
const addEntryPoint: Stage = (op, scope) => {
  const { head } = scope.clause;
  if (head.args.length === 0) {
    return RAM.filter({ type: 'emptiness-check', relation: scope.context.concreteName(head.name) }, op);
  }
  return op;
};


/*****************
 * HEAD ACTIONS *
 *****************/

export function headValues(scope: ClauseScope): RAM.Expression[] {
  return scope.clause.head.args.map((arg) => lowerValue(arg, scope));
}

function createFactInsertion(scope: ClauseScope): RAM.Operation {
  return {
    type: 'project',
    relation: scope.context.concreteName(scope.clause.head.name),
    values: headValues(scope),
  };
}

function createInsertion(scope: ClauseScope): RAM.Operation {
  const relation = headRelationName(scope);
  const project: RAM.Operation = { type: 'project', relation, values: headValues(scope) };
  if (scope.clause.head.args.length === 0) {
    return RAM.filter({ type: 'emptiness-check', relation }, project);
  }
  return project;
}

export const baseStrategy: ClauseTranslatorStrategy = {
  factOperation: createFactInsertion,
  ruleOperation: createInsertion,
  negate: addNegate,
  guardNullaryHead: true,
};
