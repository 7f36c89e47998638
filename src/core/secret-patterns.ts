const MAX_CUSTOM_SECRET_PATTERNS = 20;
const MAX_CUSTOM_SECRET_PATTERN_LENGTH = 240;
const ALLOWED_CUSTOM_FLAGS = new Set(["i", "m", "s", "u"]);

/**
 * Compiles user-supplied secret patterns. Accepts either a bare regex source or
 * the `/source/flags` form. Entries that do not compile, or that match the empty
 * string, are dropped. Every returned regex carries the `g` flag.
 */
export function compileCustomSecretPatterns(rawPatterns: readonly string[]): RegExp[] {
  return rawPatterns
    .map((raw) => raw.trim())
    .filter(Boolean)
    .slice(0, MAX_CUSTOM_SECRET_PATTERNS)
    .flatMap((raw) => {
      const normalized = raw.slice(0, MAX_CUSTOM_SECRET_PATTERN_LENGTH);
      const regex = parseCustomRegex(normalized);
      if (!regex || regex.test("")) {
        return [];
      }
      regex.lastIndex = 0;
      return [regex];
    });
}

function parseCustomRegex(raw: string): RegExp | undefined {
  const slashForm = raw.match(/^\/([\s\S]+)\/([gimsuy]*)$/);
  if (slashForm) {
    const pattern = slashForm[1];
    if (!pattern) {
      return undefined;
    }
    return tryCompile(pattern, normalizeFlags(slashForm[2] ?? ""));
  }

  return tryCompile(raw, "g");
}

function normalizeFlags(flags: string): string {
  const kept = [...new Set(flags.split(""))].filter((flag) => ALLOWED_CUSTOM_FLAGS.has(flag));
  return `g${kept.join("")}`;
}

function tryCompile(pattern: string, flags: string): RegExp | undefined {
  try {
    return new RegExp(pattern, flags);
  } catch {
    return undefined;
  }
}
