import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { Logger, ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import { CacheControlInterceptor } from "./common/interceptors/cache-control.interceptor";

const API_VERSION = "1.0.0";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });

  app.disable("x-powered-by");

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error on unknown properties
      transform: true, // Auto-transform payloads to DTO instances
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Global interceptors
  app.useGlobalInterceptors(
    new CacheControlInterceptor(),
    new LoggingInterceptor(),
  );

  // The dashboard is served from another origin
  app.enableCors({
    origin: process.env.CORS_ORIGIN || "*",
  });

  app.setGlobalPrefix("v1");

  // Swagger/OpenAPI Documentation
  const config = new DocumentBuilder()
    .setTitle("Umidade API")
    .setDescription(
      "Daily minimum relative humidity forecast for Brazilian municipalities, " +
        "collected from INMET and classified on the civil defence severity scale.",
    )
    .setVersion(API_VERSION)
    .addTag("health", "Dataset status and Redis connectivity")
    .addTag("humidity", "Map layer, municipality series and severity listings")
    .addTag("geography", "Municipal boundary overlay")
    .addTag(
      "admin",
      "⚠️ Administrative endpoints - protected by REFRESH_TOKEN when set",
    )
    .addApiKey(
      {
        type: "apiKey",
        name: "token",
        in: "query",
        description: "Refresh token (REFRESH_TOKEN)",
      },
      "admin-auth",
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);

  SwaggerModule.setup("api", app, document, {
    customSiteTitle: "Umidade API Documentation",
    swaggerOptions: {
      persistAuthorization: true,
    },
  });

  const port = process.env.PORT || 8060;
  await app.listen(port);

  const logger = new Logger("Bootstrap");
  logger.log(`🚀 Umidade API running on: http://localhost:${port}/v1`);
  logger.log(`📚 API Documentation: http://localhost:${port}/api`);
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger("Bootstrap");
  logger.error("Application failed to start", err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
