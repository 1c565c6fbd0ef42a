import {
  baseStrategy,
  translateClause,
  versionCount,
  type ClauseTranslatorStrategy,
  type Environment,
} from './clause-translator.js';
import { mkTranslatorConfig, type TranslatorConfig } from './config.js';
import * as DL from './dl.js';
import { provenanceStrategy } from './provenance-clause-translator.js';
import * as RAM from './ram.js';
import { SymbolTable } from './symbol-table.js';
import { mkTranslatorContext, type TranslatorContextOptions } from './translator-context.js';


export type TranslatedClause = {
  clause: DL.Clause,
  version: number,
  statement: RAM.Statement,
}

export function strategyFor(config: TranslatorConfig): ClauseTranslatorStrategy {
  return config.provenance ? provenanceStrategy : baseStrategy;
}

// An environment for a self-contained program: the context is computed from
// the clauses themselves.
export function mkEnvironment(
  clauses: DL.Clause[],
  optionsIn?: Partial<TranslatorConfig & TranslatorContextOptions>,
): Environment {
  const { auxiliaryArities, ...configOptions } = optionsIn ?? {};
  return {
    context: mkTranslatorContext(clauses, { auxiliaryArities }),
    symbolTable: new SymbolTable(),
    config: mkTranslatorConfig(configOptions),
  };
}

export function mkClauseTranslator(env: Environment) {
  const strategy = strategyFor(env.config);
  return (clause: DL.Clause, version: number): RAM.Statement =>
    translateClause(clause, version, env, strategy);
}

// Every clause in every semi-naive version, in program order.
export function translateProgram(clauses: DL.Clause[], env: Environment): TranslatedClause[] {
  const translate = mkClauseTranslator(env);
  const results: TranslatedClause[] = [];
  for (const clause of clauses) {
    const count = versionCount(clause, env.context);
    for (let version = 0; version < count; version++) {
      const statement = translate(clause, version);
      if (env.config.verbose) {
        console.log(`// ${DL.clauseToString(clause)} [version ${version}]\n${RAM.statementToString(statement)}`);
      }
      results.push({ clause, version, statement });
    }
  }
  return results;
}
