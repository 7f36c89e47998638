import { z } from "zod";

import { InvalidInputError, ModelOutputValidationError } from "../core/index.js";
import type { ChatCompletionClient } from "./openai-client.js";

export const INTENT_LABELS = ["QUESTION", "REQUEST", "COMPLAINT", "OTHER"] as const;

export const intentSchema = z.enum(INTENT_LABELS);

export type Intent = z.infer<typeof intentSchema>;

export const INTENT_SYSTEM_PROMPT = `You are an intent classifier. Classify the user's message into exactly one of these categories:
- QUESTION: The user is asking a question or seeking information
- REQUEST: The user is asking for an action to be performed
- COMPLAINT: The user is expressing dissatisfaction or a problem
- OTHER: The message doesn't fit the above categories

Respond with ONLY the category name in uppercase (QUESTION, REQUEST, COMPLAINT, or OTHER).
Do not include any other text, punctuation, or explanation.`;

export interface ClassifyIntentOptions {
  client: ChatCompletionClient;
  model?: string;
  signal?: AbortSignal;
}

export async function classifyIntent(
  text: string,
  options: ClassifyIntentOptions,
): Promise<Intent> {
  if (!text.trim()) {
    throw new InvalidInputError("Text cannot be empty");
  }

  const response = await options.client.complete({
    systemPrompt: INTENT_SYSTEM_PROMPT,
    userPrompt: text,
    model: options.model ?? "gpt-4o-mini",
    temperature: 0,
    maxTokens: 10,
    signal: options.signal,
  });

  return parseIntent(response);
}

export function parseIntent(raw: string): Intent {
  const normalized = raw.trim().toUpperCase();
  const parsed = intentSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new ModelOutputValidationError(
      `Invalid intent '${normalized}' returned by model. Expected one of: ${INTENT_LABELS.join(", ")}`,
      normalized,
    );
  }
  return parsed.data;
}
