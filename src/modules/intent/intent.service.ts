import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  classifyIntent,
  createOpenAIChatClient,
  type ChatCompletionClient,
  type Intent,
} from "../../ai/index.js";
import { ConfigurationError, readOptionalEnv, type EnvSource } from "../../core/index.js";
import { resolveRepoConfig } from "../../review/index.js";
import { INTENT_CHAT_CLIENT } from "./intent.tokens.js";

/** Without a key the client still resolves, and every call fails with a configuration error. */
export function createEnvChatClient(env: EnvSource = process.env): ChatCompletionClient {
  const apiKey = readOptionalEnv("OPENAI_API_KEY", env);
  if (apiKey) {
    return createOpenAIChatClient({ apiKey });
  }

  return {
    async complete() {
      throw new ConfigurationError("OPENAI_API_KEY not configured");
    },
  };
}

@Injectable()
export class IntentService {
  private readonly logger = new Logger(IntentService.name);
  private readonly model = resolveRepoConfig({}).model;

  constructor(@Inject(INTENT_CHAT_CLIENT) private readonly client: ChatCompletionClient) {}

  async classify(text: string): Promise<Intent> {
    const intent = await classifyIntent(text, { client: this.client, model: this.model });
    this.logger.log(`classified message as ${intent}`);
    return intent;
  }
}
