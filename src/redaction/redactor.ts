import { compileCustomSecretPatterns } from "../core/secret-patterns.js";
import {
  BUILTIN_REDACTION_RULES,
  customRedactionRules,
  type RedactionRule,
} from "./redaction-rules.js";

export type Redactor = (text: string) => string;

export interface RedactionReport {
  text: string;
  categories: string[];
}

export function redactWithReport(
  text: string,
  rules: readonly RedactionRule[] = BUILTIN_REDACTION_RULES,
): RedactionReport {
  return rules.reduce<RedactionReport>(
    (state, rule) => {
      const next = state.text.replace(rule.pattern, rule.replacement);
      if (next === state.text) {
        return state;
      }
      return { text: next, categories: [...state.categories, rule.name] };
    },
    { text, categories: [] },
  );
}

export function createRedactor(rules: readonly RedactionRule[]): Redactor {
  const frozen = Object.freeze([...rules]);
  return (text) => redactWithReport(text, frozen).text;
}

export const redact: Redactor = createRedactor(BUILTIN_REDACTION_RULES);

/** Built-in cascade followed by the repository's own patterns. */
export function configuredRedactionRules(
  customPatterns: readonly string[] = [],
): readonly RedactionRule[] {
  const custom = customRedactionRules(compileCustomSecretPatterns(customPatterns));
  if (custom.length === 0) {
    return BUILTIN_REDACTION_RULES;
  }
  return [...BUILTIN_REDACTION_RULES, ...custom];
}

export function createConfiguredRedactor(customPatterns: readonly string[] = []): Redactor {
  const rules = configuredRedactionRules(customPatterns);
  return rules === BUILTIN_REDACTION_RULES ? redact : createRedactor(rules);
}

export function findRedactionCategories(
  text: string,
  rules: readonly RedactionRule[] = BUILTIN_REDACTION_RULES,
): string[] {
  return redactWithReport(text, rules).categories;
}
