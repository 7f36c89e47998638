import { Controller, Get, Inject, Param, ParseIntPipe } from "@nestjs/common";

import { AppService, type HealthStatus, type Item } from "./app.service.js";

@Controller()
export class AppController {
  constructor(@Inject(AppService) private readonly appService: AppService) {}

  @Get("health")
  health(): HealthStatus {
    return this.appService.getHealth();
  }

  @Get("items/:id")
  item(@Param("id", ParseIntPipe) id: number): Item {
    return this.appService.getItem(id);
  }
}
