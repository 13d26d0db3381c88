import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { readPositiveInt } from './common/config/otp.config';
import {
  SERVICE_NAME,
  SERVICE_VERSION,
} from './features/health/health.controller';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.setGlobalPrefix('api_v1');
  app.enableCors();
  app.enableShutdownHooks();
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidUnknownValues: true,
      transform: true,
    }),
  );

  const swaggerConfig = new DocumentBuilder()
    .setTitle(SERVICE_NAME)
    .setDescription('WhatsApp OTP send, resend and verification')
    .setVersion(SERVICE_VERSION)
    .addServer('http://localhost:5000', 'Local')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document, {
    customSiteTitle: `${SERVICE_NAME} Docs`,
  });

  const port = readPositiveInt(process.env.PORT, 5000);
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Startup failed: ${(error as Error).message}`,
    (error as Error).stack,
  );
  process.exit(1);
});
