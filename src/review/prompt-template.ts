import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { isMissingFileError } from "../core/index.js";

export const DEFAULT_PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts",
);

export type PromptValues = Record<string, string | number>;

export interface LoadPromptTemplateOptions {
  directory?: string;
  onMissing?: (templatePath: string) => void;
}

export async function loadPromptTemplate(
  fileName: string,
  fallback: string,
  options: LoadPromptTemplateOptions = {},
): Promise<string> {
  const templatePath = path.join(options.directory ?? DEFAULT_PROMPTS_DIR, fileName);
  try {
    return await readFile(templatePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      options.onMissing?.(templatePath);
      return fallback;
    }
    throw error;
  }
}

/** Single pass: substituted values are never scanned for placeholders again. */
export function formatPromptTemplate(template: string, values: PromptValues): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : String(value);
  });
}
