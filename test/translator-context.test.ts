import { describe, expect, it } from "vitest";
import { parseClause, parseProgram } from "../src/dl-parse.js";
import { InvariantViolation } from "../src/misc.js";
import { deltaName, mkTranslatorContext, newName } from "../src/translator-context.js";

describe('mkTranslatorContext', () => {
  const program = parseProgram(`
    edge(1, 2).
    path(X, Y) :- edge(X, Y).
    path(X, Z) :- path(X, Y), edge(Y, Z).
    even(0).
    even(N) :- odd(M), N = M + 1.
    odd(N) :- even(M), N = M + 1.
    unreachable(X) :- node(X), !path(1, X).
    size(N) :- N = count : { edge(_, _) }.
  `);
  const context = mkTranslatorContext(program);

  it('finds self-recursive relations', () => {
    expect(context.isRecursive(['path'])).toBe(true);
    expect(context.isRecursive(['edge'])).toBe(false);
    expect(context.inSameScc(['path'], ['path'])).toBe(true);
    expect(context.inSameScc(['path'], ['edge'])).toBe(false);
  });

  it('finds mutually recursive relations', () => {
    expect(context.isRecursive(['even'])).toBe(true);
    expect(context.isRecursive(['odd'])).toBe(true);
    expect(context.inSameScc(['even'], ['odd'])).toBe(true);
  });

  it('leaves relations that only depend on recursive ones alone', () => {
    expect(context.isRecursive(['unreachable'])).toBe(false);
    expect(context.isRecursive(['size'])).toBe(false);
    expect(context.inSameScc(['unreachable'], ['path'])).toBe(false);
  });

  it('knows nothing of relations outside the program', () => {
    expect(context.isRecursive(['nope'])).toBe(false);
    expect(context.inSameScc(['nope'], ['nope'])).toBe(false);
  });

  it('tells facts from rules', () => {
    expect(context.isFact(program[0])).toBe(true);
    expect(context.isRule(program[0])).toBe(false);
    expect(context.isRule(program[1])).toBe(true);
  });

  it('names relations', () => {
    expect(context.concreteName(['a', 'b'])).toBe('a.b');
    expect(deltaName('a.b')).toBe('@delta_a.b');
    expect(newName('a.b')).toBe('@new_a.b');
  });
});

describe('getEvaluationArity', () => {
  const atom = parseClause('r(1, 2, 3).').head;

  it('defaults to no auxiliary columns', () => {
    expect(mkTranslatorContext([]).getEvaluationArity(atom)).toBe(0);
  });

  it('reads configured auxiliary arities', () => {
    expect(mkTranslatorContext([], { auxiliaryArities: { r: 2 } }).getEvaluationArity(atom)).toBe(2);
  });

  it('rejects auxiliary arities wider than the atom', () => {
    const context = mkTranslatorContext([], { auxiliaryArities: { r: 4 } });
    expect(() => context.getEvaluationArity(atom)).toThrow(InvariantViolation);
  });
});
