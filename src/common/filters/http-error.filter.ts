import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";

import {
  ConfigurationError,
  InvalidInputError,
  ModelOutputValidationError,
  UpstreamServiceError,
} from "../../core/index.js";

interface ResolvedError {
  status: number;
  message: string;
  type: string;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();
    const resolved = resolveError(exception);

    const body = {
      ok: false,
      error: resolved.message,
      type: resolved.type,
      status: resolved.status,
      path: request.originalUrl ?? request.url ?? "",
      method: request.method ?? "",
      timestamp: new Date().toISOString(),
    };

    if (resolved.status >= 500) {
      this.logger.error(JSON.stringify(body));
    } else {
      this.logger.warn(JSON.stringify(body));
    }

    response.status(resolved.status).json(body);
  }
}

export function resolveError(exception: unknown): ResolvedError {
  if (exception instanceof InvalidInputError) {
    return { status: HttpStatus.BAD_REQUEST, message: exception.message, type: exception.name };
  }

  if (exception instanceof ModelOutputValidationError) {
    return {
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      message: exception.message,
      type: exception.name,
    };
  }

  if (exception instanceof UpstreamServiceError) {
    return { status: HttpStatus.BAD_GATEWAY, message: exception.message, type: exception.name };
  }

  if (exception instanceof ConfigurationError) {
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      message: exception.message,
      type: exception.name,
    };
  }

  if (exception instanceof HttpException) {
    const payload = exception.getResponse();
    return {
      status: exception.getStatus(),
      message: typeof payload === "string" ? payload : (extractMessage(payload) ?? exception.message),
      type: exception.name,
    };
  }

  if (exception instanceof Error) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message: "internal server error",
      type: exception.name,
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: "internal server error",
    type: "UnknownError",
  };
}

function extractMessage(payload: object): string | undefined {
  if (!("message" in payload)) {
    return undefined;
  }

  const { message } = payload;
  if (typeof message === "string") {
    return message;
  }
  if (Array.isArray(message)) {
    return message.filter((item): item is string => typeof item === "string").join("; ");
  }
  return undefined;
}
