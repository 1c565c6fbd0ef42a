import * as DL from './dl.js';
import { assertNever, invariant } from './misc.js';
import * as RAM from './ram.js';
import { type SymbolTable } from './symbol-table.js';
import { type ValueIndex } from './value-index.js';


export type ValueScope = {
  index: ValueIndex,
  symbolTable: SymbolTable,
}

export function lowerValue(arg: DL.Argument, scope: ValueScope): RAM.Expression {
  switch (arg.type) {
    case 'variable': {
      const { level, element } = scope.index.lookup(arg.name);
      return RAM.tupleElement(level, element);
    }
    case 'unnamed-variable':
      return { type: 'undef-value' };
    case 'number':
      switch (arg.numType) {
        case 'int':
          return { type: 'signed-constant', value: arg.value };
        case 'unsigned':
          return { type: 'unsigned-constant', value: arg.value };
        case 'float':
          return { type: 'float-constant', value: arg.value };
        default:
          assertNever(arg.numType);
      }
    case 'string':
      return { type: 'signed-constant', value: scope.symbolTable.encode(arg.value) };
    case 'functor': {
      const functor: DL.Argument = arg;
      if (DL.isMultiResultFunctor(functor)) {
        const { level, element } = scope.index.generatorLocation(functor);
        return RAM.tupleElement(level, element);
      }
      return {
        type: 'intrinsic-operator',
        op: arg.op,
        args: arg.args.map((a) => lowerValue(a, scope)),
      };
    }
    case 'user-functor':
      return {
        type: 'user-defined-operator',
        name: arg.name,
        args: arg.args.map((a) => lowerValue(a, scope)),
      };
    case 'counter':
      return { type: 'auto-increment' };
    case 'aggregator': {
      const { level, element } = scope.index.generatorLocation(arg);
      return RAM.tupleElement(level, element);
    }
    case 'subroutine-argument':
      invariant(Number.isInteger(arg.index) && arg.index >= 0, () =>
        `bad subroutine argument index ${arg.index}`);
      return { type: 'subroutine-argument', index: arg.index };
    default:
      assertNever(arg);
  }
}

export function lowerConstraint(
  lit: DL.Literal & { type: 'constraint' },
  scope: ValueScope,
): RAM.Condition {
  return {
    type: 'constraint',
    op: lit.op,
    lhs: lowerValue(lit.lhs, scope),
    rhs: lowerValue(lit.rhs, scope),
  };
}
