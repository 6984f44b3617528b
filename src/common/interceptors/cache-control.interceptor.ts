import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";
import * as crypto from "crypto";
import { isPlainObject } from "../utils/value.util";

/**
 * Sets Cache-Control headers based on endpoint patterns and data volatility.
 *
 * Also:
 * - ETag generation (MD5 of body), except on admin endpoints
 * - Last-Modified from the dataset `generatedAt` when the body carries one
 * - Respects existing Cache-Control headers (won't overwrite if set)
 */
@Injectable()
export class CacheControlInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const path = request.url;
    const method = request.method;
    // Admin calls act on every request and must never answer 304
    const isAdmin = path.includes("/admin");

    return next.handle().pipe(
      tap((data: unknown) => {
        if (!isAdmin && data && typeof data === "object") {
          const etag = this.generateETag(data);
          if (request.headers["if-none-match"] === etag) {
            response.status(304);
            return;
          }
          response.setHeader("ETag", etag);
        }

        response.setHeader(
          "Last-Modified",
          this.extractLastModified(data).toUTCString(),
        );

        if (!response.getHeader("Cache-Control")) {
          response.setHeader(
            "Cache-Control",
            this.getCacheHeaderForPath(path, method),
          );
          response.setHeader("Vary", "Accept-Encoding");
        }
      }),
    );
  }

  private generateETag(data: object): string {
    const hash = crypto
      .createHash("md5")
      .update(JSON.stringify(data))
      .digest("hex");
    return `"${hash}"`;
  }

  private extractLastModified(data: unknown): Date {
    if (isPlainObject(data) && typeof data.generatedAt === "string") {
      const generatedAt = new Date(data.generatedAt);
      if (!Number.isNaN(generatedAt.getTime())) {
        return generatedAt;
      }
    }
    return new Date();
  }

  getCacheHeaderForPath(path: string, method: string): string {
    // No caching for write operations and admin triggers
    if ((method !== "GET" && method !== "HEAD") || path.includes("/admin")) {
      return "no-store, no-cache, must-revalidate";
    }

    // Health endpoints - minimal cache (2s) for monitoring
    if (path.includes("/health")) {
      return "public, max-age=2, s-maxage=2";
    }

    // Boundary overlay only changes on redeploy (1 day)
    if (path.includes("/geography")) {
      return "public, max-age=86400, s-maxage=86400";
    }

    // Swagger UI and spec (1 hour)
    if (path.startsWith("/api")) {
      return "public, max-age=3600, s-maxage=3600";
    }

    // Humidity data changes once a day; keep edges short so a manual refresh
    // shows up quickly (5 min)
    return "public, max-age=300, s-maxage=300, stale-while-revalidate=600";
  }
}
