import fs from 'node:fs';
import * as Peggy from 'peggy';
import * as DL from './dl.js';


// The grammar sits beside src/ and dist/, so this path works from either.
const grammarUrl = new URL('../grammar/dl.pegjs', import.meta.url);

let _parser: Peggy.Parser | null = null;
function getParser(): Peggy.Parser {
  if (!_parser) {
    _parser = Peggy.generate(fs.readFileSync(grammarUrl, 'utf8'), {
      allowedStartRules: ['Program', 'Clause'],
      grammarSource: 'dl.pegjs',
    });
  }
  return _parser;
}

function parseWith(startRule: 'Program' | 'Clause', input: string) {
  const parser = getParser();
  try {
    return parser.parse(input, { startRule, grammarSource: input });
  } catch (e) {
    if (e instanceof parser.SyntaxError) {
      const loc = e.location;
      const highlightedSource =
        input.slice(0, loc.start.offset) +
        "\x1b[1m" + input.slice(loc.start.offset, loc.end.offset) + "\x1b[22m" +
        input.slice(loc.end.offset);
      e.message =
        e.message +
        "\n    " + highlightedSource +
        "\n    " + " ".repeat(loc.start.column - 1) + "\x1b[1m^\x1b[22m";
    }
    throw e;
  }
}

// The grammar's actions build DL values; nothing checks them again here.
export function parseClause(input: string): DL.Clause {
  return parseWith('Clause', input) as DL.Clause;
}

export function parseProgram(input: string): DL.Clause[] {
  return parseWith('Program', input) as DL.Clause[];
}
