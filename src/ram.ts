import inspect from 'object-inspect';
import { type AggregateFn, type ConstraintOp } from './dl.js';
import { assertNever } from './misc.js';


// ram is the imperative intermediate representation produced by the clause
// translator and consumed by the code generator. Operations nest: each one
// runs its `nested` operation once per tuple (scan), when a condition holds
// (filter), and so on, down to a project or a subroutine return.
//
// Order within `values` lists is significant to the code generator.

export type RelationName = string;

export type Expression =
  | { type: 'tuple-element', level: number, element: number }
  | { type: 'signed-constant', value: number }
  | { type: 'unsigned-constant', value: number }
  | { type: 'float-constant', value: number }
  | { type: 'undef-value' }
  | { type: 'intrinsic-operator', op: string, args: Expression[] }
  | { type: 'user-defined-operator', name: string, args: Expression[] }
  | { type: 'auto-increment' }
  | { type: 'subroutine-argument', index: number }

export type Condition =
  | { type: 'true' }
  | { type: 'conjunction', lhs: Condition, rhs: Condition }
  | { type: 'negation', operand: Condition }
  | { type: 'constraint', op: ConstraintOp, lhs: Expression, rhs: Expression }
  | { type: 'existence-check', relation: RelationName, values: Expression[] }
  | {
      // Like an existence check, but undefined values match anything and
      // height columns take part in the comparison.
      type: 'provenance-existence-check',
      relation: RelationName,
      values: Expression[],
    }
  | { type: 'emptiness-check', relation: RelationName }

export type Operation =
  | { type: 'scan', relation: RelationName, level: number, nested: Operation }
  | { type: 'filter', condition: Condition, nested: Operation }
  | { type: 'break', condition: Condition, nested: Operation }
  | {
      // Binds t<level>.0 to the aggregate over matching tuples of `relation`.
      // While aggregating, t<level> ranges over `relation` itself.
      type: 'aggregate',
      fn: AggregateFn,
      relation: RelationName,
      expression: Expression,
      condition: Condition,
      level: number,
      nested: Operation,
    }
  | {
      // Binds t<level>.0 to each result of a multi-result functor.
      type: 'nested-intrinsic-operator',
      op: string,
      args: Expression[],
      level: number,
      nested: Operation,
    }
  | { type: 'project', relation: RelationName, values: Expression[] }
  | { type: 'subroutine-return', values: Expression[] }

export type Statement =
  | { type: 'query', operation: Operation }


export function tupleElement(level: number, element: number): Expression {
  return { type: 'tuple-element', level, element };
}

export function filter(condition: Condition, nested: Operation): Operation {
  return { type: 'filter', condition, nested };
}

export function negation(operand: Condition): Condition {
  return { type: 'negation', operand };
}

export function equals(lhs: Expression, rhs: Expression): Condition {
  return { type: 'constraint', op: '=', lhs, rhs };
}

export function conjoin(lhs: Condition | undefined, rhs: Condition): Condition {
  return lhs ? { type: 'conjunction', lhs, rhs } : rhs;
}

// Walks an operation tree from the outside in.
export function operationsOf(op: Operation): Operation[] {
  switch (op.type) {
    case 'scan':
    case 'filter':
    case 'break':
    case 'aggregate':
    case 'nested-intrinsic-operator':
      return [op, ...operationsOf(op.nested)];
    case 'project':
    case 'subroutine-return':
      return [op];
    default:
      assertNever(op);
  }
}

// The project or subroutine return at the bottom of an operation tree.
export function innermost(op: Operation): Operation & { type: 'project' | 'subroutine-return' } {
  switch (op.type) {
    case 'scan':
    case 'filter':
    case 'break':
    case 'aggregate':
    case 'nested-intrinsic-operator':
      return innermost(op.nested);
    case 'project':
    case 'subroutine-return':
      return op;
    default:
      assertNever(op);
  }
}

export function statementToString(statement: Statement): string {
  switch (statement.type) {
    case 'query':
      return ['QUERY', ...operationToLines(statement.operation, 1), 'END QUERY'].join('\n');
    default:
      throw new Error(`Unexpected statement: ${inspect(statement)}`);
  }
}

function operationToLines(op: Operation, depth: number): string[] {
  const indent = '  '.repeat(depth);
  switch (op.type) {
    case 'scan':
      return [
        `${indent}FOR t${op.level} IN ${op.relation}`,
        ...operationToLines(op.nested, depth + 1),
      ];
    case 'filter':
      return [
        `${indent}IF ${conditionToString(op.condition)}`,
        ...operationToLines(op.nested, depth + 1),
      ];
    case 'break':
      return [
        `${indent}BREAK IF ${conditionToString(op.condition)}`,
        ...operationToLines(op.nested, depth),
      ];
    case 'aggregate': {
      const expression = op.expression.type === 'undef-value' ? '' : ` ${expressionToString(op.expression)}`;
      return [
        `${indent}t${op.level}.0 = ${op.fn.toUpperCase()}${expression} FOR ALL t${op.level} IN ${op.relation} WHERE ${conditionToString(op.condition)}`,
        ...operationToLines(op.nested, depth + 1),
      ];
    }
    case 'nested-intrinsic-operator':
      return [
        `${indent}${op.op.toUpperCase()}(${op.args.map(expressionToString).join(', ')}) INTO t${op.level}`,
        ...operationToLines(op.nested, depth + 1),
      ];
    case 'project':
      return [`${indent}INSERT (${op.values.map(expressionToString).join(', ')}) INTO ${op.relation}`];
    case 'subroutine-return':
      return [`${indent}RETURN (${op.values.map(expressionToString).join(', ')})`];
    default:
      assertNever(op);
  }
}

export function conditionToString(cond: Condition): string {
  switch (cond.type) {
    case 'true':
      return 'true';
    case 'conjunction':
      return `${conditionToString(cond.lhs)} AND ${conditionToString(cond.rhs)}`;
    case 'negation':
      return `(NOT ${conditionToString(cond.operand)})`;
    case 'constraint':
      return `(${expressionToString(cond.lhs)} ${cond.op} ${expressionToString(cond.rhs)})`;
    case 'existence-check':
      return `(${cond.values.map(expressionToString).join(', ')}) IN ${cond.relation}`;
    case 'provenance-existence-check':
      return `(${cond.values.map(expressionToString).join(', ')}) PROV IN ${cond.relation}`;
    case 'emptiness-check':
      return `ISEMPTY(${cond.relation})`;
    default:
      assertNever(cond);
  }
}

const infixOps = new Set(['+', '-', '*', '/', '%']);

export function expressionToString(exp: Expression): string {
  switch (exp.type) {
    case 'tuple-element':
      return `t${exp.level}.${exp.element}`;
    case 'signed-constant':
      return `number(${exp.value})`;
    case 'unsigned-constant':
      return `unsigned(${exp.value})`;
    case 'float-constant':
      return `float(${exp.value})`;
    case 'undef-value':
      return '_';
    case 'intrinsic-operator':
      if (infixOps.has(exp.op) && exp.args.length === 2) {
        return `(${expressionToString(exp.args[0])} ${exp.op} ${expressionToString(exp.args[1])})`;
      }
      return `${exp.op.toUpperCase()}(${exp.args.map(expressionToString).join(', ')})`;
    case 'user-defined-operator':
      return `@${exp.name}(${exp.args.map(expressionToString).join(', ')})`;
    case 'auto-increment':
      return 'autoinc()';
    case 'subroutine-argument':
      return `argument(${exp.index})`;
    default:
      assertNever(exp);
  }
}
