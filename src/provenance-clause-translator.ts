import _ from 'lodash';
import {
  addNegate,
  headValues,
  translateClause,
  type ClauseScope,
  type ClauseTranslatorStrategy,
  type Environment,
  type NegationBuilder,
} from './clause-translator.js';
import * as DL from './dl.js';
import { assertNever, invariant } from './misc.js';
import * as RAM from './ram.js';
import { lowerValue } from './value-translator.js';


// Provenance lowering produces subroutines rather than insertions. Given a
// tuple to explain, a subroutine returns the values of everything the clause
// looked at, so that a proof tree can be rebuilt one step at a time.
//
// Relations carry auxiliary columns at the end: first the number of the rule
// that derived the tuple, then its proof height(s).

// Every value the clause body touches, in body order. Recursive clauses add
// the head's own values and a -1 for each auxiliary column, which is not known
// until the tuple is actually derived.
export function createValueSubroutine(scope: ClauseScope): RAM.Operation {
  const lower = (arg: DL.Argument) => lowerValue(arg, scope);
  const values: RAM.Expression[] = [];

  for (const lit of scope.clause.body) {
    switch (lit.type) {
      case 'atom':
        values.push(...lit.args.map(lower));
        break;
      case 'negation':
        values.push(...lit.atom.args.map(lower));
        break;
      case 'constraint':
        values.push(lower(lit.lhs), lower(lit.rhs));
        break;
      default:
        assertNever(lit);
    }
  }

  if (scope.isRecursive) {
    const { head } = scope.clause;
    const auxiliaryArity = scope.context.getEvaluationArity(head);
    invariant(auxiliaryArity <= head.args.length, () =>
      `auxiliary arity ${auxiliaryArity} out of bounds for ${DL.atomToString(head)}`);
    values.push(
      ...head.args.slice(0, head.args.length - auxiliaryArity).map(lower),
      ..._.times(auxiliaryArity, (): RAM.Expression => ({ type: 'signed-constant', value: -1 })),
    );
  }

  return { type: 'subroutine-return', values };
}

// A fact needs no search: its subroutine just hands back its own values.
function createFactSubroutine(scope: ClauseScope): RAM.Operation {
  return { type: 'subroutine-return', values: headValues(scope) };
}

// The rule number is left undefined, since a tuple derived by any rule
// counts; height columns stay in so that minimality comparisons see them.
export const addProvenanceNegate: NegationBuilder = (atom, nested, isDelta, scope) => {
  if (isDelta) {
    return addNegate(atom, nested, isDelta, scope);
  }

  const auxiliaryArity = scope.context.getEvaluationArity(atom);
  invariant(auxiliaryArity <= atom.args.length, () =>
    `auxiliary arity ${auxiliaryArity} out of bounds for ${DL.atomToString(atom)}`);
  const arity = atom.args.length - auxiliaryArity;

  const values = atom.args.slice(0, arity).map((arg) => lowerValue(arg, scope));
  if (scope.config.provenance) {
    values.push({ type: 'undef-value' });
    for (let height = 1; height < auxiliaryArity; height++) {
      values.push(lowerValue(atom.args[arity + height], scope));
    }
  }

  return RAM.filter(
    RAM.negation({
      type: 'provenance-existence-check',
      relation: scope.context.concreteName(atom.name),
      values,
    }),
    nested,
  );
};

export const provenanceStrategy: ClauseTranslatorStrategy = {
  factOperation: createFactSubroutine,
  ruleOperation: createValueSubroutine,
  negate: addProvenanceNegate,
  // a subroutine explains a tuple that is already there
  guardNullaryHead: false,
};

export function translateProvenanceClause(clause: DL.Clause, version: number, env: Environment): RAM.Statement {
  return translateClause(clause, version, env, provenanceStrategy);
}
