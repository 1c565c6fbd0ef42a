export * as DL from './dl.js';
export * as RAM from './ram.js';
export { parseClause, parseProgram } from './dl-parse.js';
export { defaultTranslatorConfig, mkTranslatorConfig, type TranslatorConfig } from './config.js';
export { InvariantViolation } from './misc.js';
export { SymbolTable } from './symbol-table.js';
export {
  deltaName,
  mkTranslatorContext,
  newName,
  type TranslatorContext,
  type TranslatorContextOptions,
} from './translator-context.js';
export { ValueIndex, type Location } from './value-index.js';
export { lowerConstraint, lowerValue, type ValueScope } from './value-translator.js';
export {
  addNegate,
  baseStrategy,
  translateClause,
  translateClauseVersions,
  translateFact,
  translateRule,
  TranslationError,
  type ClauseScope,
  type ClauseTranslatorStrategy,
  type Environment,
  type NegationBuilder,
} from './clause-translator.js';
export {
  addProvenanceNegate,
  createValueSubroutine,
  provenanceStrategy,
  translateProvenanceClause,
} from './provenance-clause-translator.js';
export {
  mkClauseTranslator,
  mkEnvironment,
  strategyFor,
  translateProgram,
  type TranslatedClause,
} from './translate-program.js';
