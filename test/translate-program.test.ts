import { afterEach, describe, expect, it, vi } from "vitest";
import { clauseToString } from "../src/dl.js";
import { parseProgram } from "../src/dl-parse.js";
import { statementToString } from "../src/ram.js";
import { mkClauseTranslator, mkEnvironment, translateProgram } from "../src/translate-program.js";

const program = parseProgram(`
  edge(1, 2).
  path(X, Y) :- edge(X, Y).
  path(X, Z) :- path(X, Y), path(Y, Z).
`);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('translateProgram', () => {
  it('translates every clause in every version', () => {
    const results = translateProgram(program, mkEnvironment(program));
    expect(results.map(({ clause, version }) => [clauseToString(clause), version])).toEqual([
      ['edge(1, 2).', 0],
      ['path(X, Y) :- edge(X, Y).', 0],
      ['path(X, Z) :- path(X, Y), path(Y, Z).', 0],
      ['path(X, Z) :- path(X, Y), path(Y, Z).', 1],
    ]);
  });

  it('logs each statement when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    translateProgram(program, mkEnvironment(program, { verbose: true }));
    expect(log).toHaveBeenCalledTimes(4);
    expect(log.mock.calls[0]).toEqual([
      '// edge(1, 2). [version 0]\nQUERY\n  INSERT (number(1), number(2)) INTO edge\nEND QUERY',
    ]);
  });

  it('stays quiet otherwise', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    translateProgram(program, mkEnvironment(program));
    expect(log).not.toHaveBeenCalled();
  });

  it('uses subroutines under provenance', () => {
    const [fact] = translateProgram(program, mkEnvironment(program, { provenance: true }));
    expect(fact.statement).toEqual({
      type: 'query',
      operation: {
        type: 'subroutine-return',
        values: [{ type: 'signed-constant', value: 1 }, { type: 'signed-constant', value: 2 }],
      },
    });
  });
});

describe('mkClauseTranslator', () => {
  it('translates single clauses with the configured strategy', () => {
    const translate = mkClauseTranslator(mkEnvironment(program));
    expect(statementToString(translate(program[1], 0))).toEqual([
      'QUERY',
      '  FOR t0 IN edge',
      '    INSERT (t0.0, t0.1) INTO path',
      'END QUERY',
    ].join('\n'));
  });
});
