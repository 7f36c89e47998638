import { BadRequestException, Body, Controller, HttpCode, Inject, Post } from "@nestjs/common";
import { z } from "zod";

import type { Intent } from "../../ai/index.js";
import { IntentService } from "./intent.service.js";

const intentRequestSchema = z.object({
  text: z.string({ required_error: "text is required" }),
});

@Controller("intent")
export class IntentController {
  constructor(@Inject(IntentService) private readonly intentService: IntentService) {}

  @Post()
  @HttpCode(200)
  async classify(@Body() body: unknown): Promise<{ intent: Intent }> {
    const parsed = intentRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues[0]?.message ?? "invalid request body");
    }

    return { intent: await this.intentService.classify(parsed.data.text) };
  }
}
