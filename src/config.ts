export type TranslatorConfig = {
  // Lower clauses for proof reconstruction: value subroutines instead of
  // insertions, and negation checks that ignore the rule-number column.
  provenance: boolean,
  // Print every translated clause (see translateProgram).
  verbose: boolean,
}

export const defaultTranslatorConfig: TranslatorConfig = {
  provenance: false,
  verbose: false,
};

export function mkTranslatorConfig(optionsIn?: Partial<TranslatorConfig>): TranslatorConfig {
  return Object.assign({ ...defaultTranslatorConfig }, optionsIn ?? {});
}
