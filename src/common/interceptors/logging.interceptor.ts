import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";
import { isPlainObject } from "../utils/value.util";

/** A humidity read slower than this most likely waited for a rebuild. */
export const SLOW_REQUEST_MS = 1000;

export interface RequestLogEntry {
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
  body?: unknown;
}

/**
 * Global logging interceptor for HTTP requests.
 *
 * Only logs interesting events:
 * - Errors (4xx, 5xx status codes)
 * - Slow reads, usually a request that waited for the daily collection
 * - Admin endpoints, with the outcome of a refresh
 *
 * Query strings are never logged, since they carry the refresh token.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const method = request.method;
    const path = stripQuery(request.url);
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: (body: unknown) => {
          this.write({
            method,
            path,
            statusCode: response.statusCode,
            responseTime: Date.now() - startTime,
            body,
          });
        },
        error: (err: unknown) => {
          this.write({
            method,
            path,
            statusCode: err instanceof HttpException ? err.getStatus() : 500,
            responseTime: Date.now() - startTime,
          });
        },
      }),
    );
  }

  /**
   * The log line for a finished request, or null for routine traffic.
   */
  describe(entry: RequestLogEntry): string | null {
    const { method, path, statusCode, responseTime } = entry;
    const line = `${method} ${path} ${statusCode} - ${responseTime}ms`;

    const outcome = path.includes("/admin/refresh")
      ? describeRefreshOutcome(entry.body)
      : null;
    const suffix = outcome ? ` - ${outcome}` : "";

    if (statusCode >= 400) {
      return `❌ ${line}${suffix}`;
    }

    if (path.includes("/admin")) {
      return `🔧 ${line}${suffix}`;
    }

    if (responseTime > SLOW_REQUEST_MS) {
      return path.includes("/humidity")
        ? `🐌 ${line} - waited for the humidity dataset`
        : `🐌 ${line}`;
    }

    return null;
  }

  private write(entry: RequestLogEntry): void {
    const message = this.describe(entry);
    if (message === null) {
      return;
    }
    if (entry.statusCode >= 500) {
      this.logger.error(message);
    } else if (entry.statusCode >= 400) {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}

function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}

function describeRefreshOutcome(body: unknown): string | null {
  if (!isPlainObject(body)) {
    return null;
  }
  if (typeof body.jobId === "string" || typeof body.jobId === "number") {
    return `queued job ${body.jobId}`;
  }
  if (body.ok === true) {
    return "dataset rebuilt";
  }
  if (body.ok === false) {
    return `rebuild failed: ${typeof body.error === "string" ? body.error : "unknown error"}`;
  }
  return null;
}
