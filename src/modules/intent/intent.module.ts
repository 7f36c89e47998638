import { Module } from "@nestjs/common";

import { IntentController } from "./intent.controller.js";
import { createEnvChatClient, IntentService } from "./intent.service.js";
import { INTENT_CHAT_CLIENT } from "./intent.tokens.js";

@Module({
  controllers: [IntentController],
  providers: [
    IntentService,
    {
      provide: INTENT_CHAT_CLIENT,
      useFactory: () => createEnvChatClient(),
    },
  ],
})
export class IntentModule {}
