import { assertNever } from './misc.js';


// dl is the AST format for the Datalog clauses we lower to RAM. Clauses reach
// the translator already type-checked and stratified; nothing here validates.

export type QualifiedName = string[];

export type ConstraintOp = '=' | '!=' | '<' | '<=' | '>' | '>=';

export type AggregateFn = 'count' | 'sum' | 'min' | 'max' | 'mean';

export type NumericType = 'int' | 'unsigned' | 'float';

export type Argument =
  | { type: 'variable', name: string }
  | { type: 'unnamed-variable' }
  | { type: 'number', value: number, numType: NumericType }
  | { type: 'string', value: string }
  | {
      type: 'functor',
      // Arithmetic symbols (`+`, `-`, ...) or a builtin name like `cat`.
      // `range` yields several results and so acts as a generator.
      op: string,
      args: Argument[],
    }
  | { type: 'user-functor', name: string, args: Argument[] }
  | { type: 'counter' }
  | {
      type: 'aggregator',
      fn: AggregateFn,
      // absent for `count`
      target?: Argument,
      // exactly one atom, plus any number of constraints
      body: Literal[],
    }
  | {
      // Bound by the caller of a provenance subroutine.
      type: 'subroutine-argument',
      index: number,
    }

export type Atom = {
  name: QualifiedName,
  args: Argument[],
}

// A "literal" is a piece of a clause's body. (It is not a value like 123 or
// "abc"; those are "constants".)
export type Literal =
  | { type: 'atom' } & Atom
  | { type: 'negation', atom: Atom }
  | { type: 'constraint', op: ConstraintOp, lhs: Argument, rhs: Argument }

export type Clause = {
  head: Atom,
  body: Literal[],
}

export type Generator = Argument & { type: 'aggregator' | 'functor' };

const multiResultFunctors = new Set(['range', 'urange', 'frange']);

export function isMultiResultFunctor(arg: Argument): arg is Argument & { type: 'functor' } {
  return arg.type === 'functor' && multiResultFunctors.has(arg.op);
}

export function isGenerator(arg: Argument): arg is Generator {
  return arg.type === 'aggregator' || isMultiResultFunctor(arg);
}

export type AtomLiteral = Literal & { type: 'atom' };

// The positive atoms of a body, in order. These are the literals themselves,
// so they can be compared by identity.
export function bodyAtoms(literals: Literal[]): AtomLiteral[] {
  return literals.filter((lit): lit is AtomLiteral => lit.type === 'atom');
}

export function qualifiedNameToString(name: QualifiedName): string {
  return name.join('.');
}

// Pre-order walk over every argument appearing in the given literals,
// descending into functors and aggregator bodies.
export function visitArguments(literals: Literal[], visit: (arg: Argument) => void): void {
  const visitArg = (arg: Argument) => visitArgument(arg, visit);
  for (const lit of literals) {
    switch (lit.type) {
      case 'atom':
        lit.args.forEach(visitArg);
        break;
      case 'negation':
        lit.atom.args.forEach(visitArg);
        break;
      case 'constraint':
        visitArg(lit.lhs);
        visitArg(lit.rhs);
        break;
      default:
        assertNever(lit);
    }
  }
}

export function visitArgument(arg: Argument, visit: (arg: Argument) => void): void {
  visit(arg);
  switch (arg.type) {
    case 'functor':
    case 'user-functor':
      arg.args.forEach((a) => visitArgument(a, visit));
      return;
    case 'aggregator':
      if (arg.target) { visitArgument(arg.target, visit); }
      visitArguments(arg.body, visit);
      return;
    case 'variable':
    case 'unnamed-variable':
    case 'number':
    case 'string':
    case 'counter':
    case 'subroutine-argument':
      return;
    default:
      assertNever(arg);
  }
}

export function clauseToString(clause: Clause): string {
  if (clause.body.length === 0) {
    return `${atomToString(clause.head)}.`;
  }
  return `${atomToString(clause.head)} :- ${clause.body.map(literalToString).join(', ')}.`;
}

export function literalToString(lit: Literal): string {
  switch (lit.type) {
    case 'atom':
      return atomToString(lit);
    case 'negation':
      return `!${atomToString(lit.atom)}`;
    case 'constraint':
      return `${argumentToString(lit.lhs)} ${lit.op} ${argumentToString(lit.rhs)}`;
    default:
      assertNever(lit);
  }
}

export function atomToString(atom: Atom): string {
  return `${qualifiedNameToString(atom.name)}(${atom.args.map(argumentToString).join(', ')})`;
}

const infixOps = new Set(['+', '-', '*', '/', '%']);

export function argumentToString(arg: Argument): string {
  switch (arg.type) {
    case 'variable':
      return arg.name;
    case 'unnamed-variable':
      return '_';
    case 'number':
      switch (arg.numType) {
        case 'int':
          return String(arg.value);
        case 'unsigned':
          return `${arg.value}u`;
        case 'float':
          return Number.isInteger(arg.value) ? arg.value.toFixed(1) : String(arg.value);
        default:
          assertNever(arg.numType);
      }
    case 'string':
      return JSON.stringify(arg.value);
    case 'functor':
      if (infixOps.has(arg.op) && arg.args.length === 2) {
        return `(${argumentToString(arg.args[0])} ${arg.op} ${argumentToString(arg.args[1])})`;
      }
      return `${arg.op}(${arg.args.map(argumentToString).join(', ')})`;
    case 'user-functor':
      return `@${arg.name}(${arg.args.map(argumentToString).join(', ')})`;
    case 'counter':
      return '$';
    case 'aggregator': {
      const target = arg.target ? ` ${argumentToString(arg.target)}` : '';
      return `${arg.fn}${target} : { ${arg.body.map(literalToString).join(', ')} }`;
    }
    case 'subroutine-argument':
      return `$${arg.index}`;
    default:
      assertNever(arg);
  }
}
