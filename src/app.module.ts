import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";

import { AppController } from "./app.controller.js";
import { AppService } from "./app.service.js";
import { HttpErrorFilter } from "./common/filters/http-error.filter.js";
import { IntentModule } from "./modules/intent/intent.module.js";

@Module({
  imports: [IntentModule],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_FILTER,
      useClass: HttpErrorFilter,
    },
  ],
})
export class AppModule {}
