import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import cookieParser from 'cookie-parser';
import { AppModule } from './app.module';
import { APP_CONFIG, type AppConfig, loadEnv } from './config/env';

async function bootstrap() {
  loadEnv(); // <- load dotenv before creating app
  const isProd = process.env.NODE_ENV === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger: isProd ? ['error', 'warn'] : ['error', 'warn', 'log', 'debug', 'verbose'] });
  const config = app.get<AppConfig>(APP_CONFIG);

  app.setGlobalPrefix('api');
  // req.ip honours X-Forwarded-For only up to the configured proxy hops
  app.set('trust proxy', config.trustProxyHops);

  app.enableCors({
    origin: config.corsOrigins,
    credentials: true, // Allow sending cookies from the client
  });

  app.use(cookieParser());
  app.enableShutdownHooks();

  if (!isProd) {
    const document = new DocumentBuilder()
      .setTitle('Store API')
      .setDescription('Customer authentication and session management')
      .setVersion('1.0')
      .addBearerAuth()
      .addCookieAuth('refreshToken')
      .build();
    SwaggerModule.setup('swagger', app, SwaggerModule.createDocument(app, document));
  }

  await app.listen(config.port);
  new Logger('Bootstrap').log(`Store API is running on: ${await app.getUrl()} (${config.nodeEnv})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
