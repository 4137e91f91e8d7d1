import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ValidationPipe, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { appLogger } from './common/utils/app-logger';
import { NestAppLogger } from './common/utils/nest-app-logger';

export async function bootstrap(): Promise<void> {
  const fastifyAdapter = new FastifyAdapter({
    logger: false,
    bodyLimit: 1048576,
    disableRequestLogging: true,
  });

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, fastifyAdapter, {
    logger: new NestAppLogger(),
  });

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port', 3000);
  const nodeEnv = configService.get<string>('nodeEnv', 'development');

  app.setGlobalPrefix('api', {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // closes Redis and stops the sweep schedule on SIGTERM/SIGINT
  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');
  appLogger.success(`Server is running on http://localhost:${port}`);
  appLogger.log(`Environment: ${nodeEnv}`);
  appLogger.log(`Process PID: ${process.pid}`);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    appLogger.error('Fatal error during bootstrap:', error);
    process.exit(1);
  });
}
