export type BuiltinRedactionCategory =
  | "aws-access-key"
  | "keyword-assignment"
  | "env-assignment"
  | "bearer-token"
  | "github-token"
  | "quoted-hex"
  | "sk-api-key"
  | "jwt"
  | "pem-private-key";

export interface RedactionRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

export interface RedactionRuleDefinition {
  name: string;
  source: string;
  replacement: string;
  caseInsensitive?: boolean;
  multiline?: boolean;
}

export const REDACTION_PLACEHOLDERS = {
  generic: "[REDACTED]",
  awsKey: "[REDACTED_AWS_KEY]",
  hex: "[REDACTED_HEX]",
  skKey: "[REDACTED_SK_KEY]",
  jwt: "[REDACTED_JWT]",
  pemKey: "[REDACTED_PEM_KEY]",
  custom: "[REDACTED_CUSTOM]",
} as const;

const SENSITIVE_KEYWORDS = [
  "api[_-]?key",
  "secret",
  "token",
  "password",
  "auth",
  "credential",
  "private[_-]?key",
];

const SENSITIVE_ENV_NAMES = [
  "API_KEY",
  "SECRET",
  "TOKEN",
  "PASSWORD",
  "AUTH",
  "CREDENTIAL",
  "PRIVATE_KEY",
  "ACCESS_KEY",
  "DATABASE_URL",
  "DB_PASSWORD",
];

export function defineRedactionRule(definition: RedactionRuleDefinition): RedactionRule {
  const flags = `g${definition.caseInsensitive ? "i" : ""}${definition.multiline ? "m" : ""}`;
  return Object.freeze({
    name: definition.name,
    pattern: new RegExp(definition.source, flags),
    replacement: definition.replacement,
  });
}

// Order matters: a substring replaced by an earlier rule can no longer match a
// later one, so the more specific shapes that come first win.
export const BUILTIN_REDACTION_RULES: readonly RedactionRule[] = Object.freeze(
  (
    [
      {
        name: "aws-access-key",
        source: "AKIA[0-9A-Z]{16}",
        replacement: REDACTION_PLACEHOLDERS.awsKey,
      },
      {
        name: "keyword-assignment",
        source: `((?:${SENSITIVE_KEYWORDS.join("|")})\\s*[:=]\\s*['"]?)[A-Za-z0-9_-]{20,}`,
        replacement: `$1${REDACTION_PLACEHOLDERS.generic}`,
        caseInsensitive: true,
      },
      {
        name: "env-assignment",
        source: `^(\\s*(?:export\\s+)?(?:${SENSITIVE_ENV_NAMES.join("|")})[A-Z_]*\\s*=\\s*)[^\\r\\n]+`,
        replacement: `$1${REDACTION_PLACEHOLDERS.generic}`,
        caseInsensitive: true,
        multiline: true,
      },
      {
        name: "bearer-token",
        source: "(Bearer\\s+)[A-Za-z0-9_.-]{20,}",
        replacement: `$1${REDACTION_PLACEHOLDERS.generic}`,
        caseInsensitive: true,
      },
      {
        name: "github-token",
        source: "(gh[ps]_)[A-Za-z0-9]{36,}",
        replacement: `$1${REDACTION_PLACEHOLDERS.generic}`,
      },
      {
        name: "quoted-hex",
        source: "(['\"])[A-Fa-f0-9]{40,}(?=\\1)",
        replacement: `$1${REDACTION_PLACEHOLDERS.hex}`,
      },
      {
        name: "sk-api-key",
        source: "sk-[A-Za-z0-9_-]{20,}",
        replacement: REDACTION_PLACEHOLDERS.skKey,
      },
      {
        name: "jwt",
        source: "eyJ[A-Za-z0-9_-]{10,}\\.eyJ[A-Za-z0-9_-]{10,}\\.[A-Za-z0-9_-]{10,}",
        replacement: REDACTION_PLACEHOLDERS.jwt,
      },
      {
        name: "pem-private-key",
        source:
          "-----BEGIN [A-Z ]*PRIVATE KEY-----[\\s\\S]*?-----END [A-Z ]*PRIVATE KEY-----",
        replacement: REDACTION_PLACEHOLDERS.pemKey,
      },
    ] satisfies Array<RedactionRuleDefinition & { name: BuiltinRedactionCategory }>
  ).map(defineRedactionRule),
);

export function customRedactionRules(patterns: readonly RegExp[]): RedactionRule[] {
  return patterns.map((pattern, index) =>
    Object.freeze({
      name: `custom-${index + 1}`,
      pattern: pattern.global ? pattern : new RegExp(pattern.source, `g${pattern.flags}`),
      replacement: REDACTION_PLACEHOLDERS.custom,
    }),
  );
}
