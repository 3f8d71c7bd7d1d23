import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import validationOptions from './utils/validation-options';
import { AllConfigType } from './config/config.type';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = new Logger('Bootstrap');

  // HIPAA Security: Add security headers using Helmet
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'", "'unsafe-eval'"], // Swagger UI needs unsafe-eval
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
        },
      },
      hsts: {
        maxAge: 31536000, // 1 year in seconds
        includeSubDomains: true,
      },
      noSniff: true,
    }),
  );

  app.enableCors({
    origin: configService.getOrThrow('app.corsOrigin', { infer: true }),
    methods: ['GET', 'POST'],
  });
  app.enableShutdownHooks();
  app.useGlobalPipes(new ValidationPipe(validationOptions));

  if (configService.getOrThrow('app.swaggerEnabled', { infer: true })) {
    const options = new DocumentBuilder()
      .setTitle(configService.getOrThrow('app.name', { infer: true }))
      .setDescription(
        'Classifies scanned medical documents and archives them by category',
      )
      .setVersion('1.0')
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document);

    logger.log(
      `Swagger documentation available at http://localhost:${configService.getOrThrow('app.port', { infer: true })}/docs`,
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
