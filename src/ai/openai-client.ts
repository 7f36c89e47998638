import OpenAI from "openai";

import { getErrorMessage, readNumberEnv, UpstreamServiceError } from "../core/index.js";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionsApi {
  create(
    body: {
      model: string;
      temperature: number;
      max_tokens: number;
      messages: ChatMessage[];
    },
    options?: { signal?: AbortSignal },
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export interface ChatCompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<string>;
}

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
  api?: ChatCompletionsApi;
}

export function createOpenAIChatClient(options: OpenAIChatClientOptions): ChatCompletionClient {
  const api =
    options.api ??
    new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
      timeout: options.timeoutMs ?? readNumberEnv("AI_HTTP_TIMEOUT_MS", 60_000),
      maxRetries: options.maxRetries ?? readNumberEnv("AI_HTTP_RETRIES", 2),
    }).chat.completions;

  return {
    async complete(request) {
      let completion: Awaited<ReturnType<ChatCompletionsApi["create"]>>;
      try {
        completion = await api.create(
          {
            model: request.model,
            temperature: request.temperature ?? 0.3,
            max_tokens: request.maxTokens ?? 1_500,
            messages: [
              { role: "system", content: request.systemPrompt },
              { role: "user", content: request.userPrompt },
            ],
          },
          request.signal ? { signal: request.signal } : undefined,
        );
      } catch (error) {
        throw new UpstreamServiceError("openai", `OpenAI API error: ${getErrorMessage(error)}`, {
          status: error instanceof OpenAI.APIError ? error.status : undefined,
          cause: error,
        });
      }

      const content = completion.choices[0]?.message.content?.trim();
      if (!content) {
        throw new UpstreamServiceError("openai", "OpenAI returned an empty response");
      }
      return content;
    },
  };
}
