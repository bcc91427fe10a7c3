import { INestApplication, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';

/**
 * HTTP middleware and pipes shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  // Security + performance
  app.use(helmet());
  app.use(compression());

  // CORS (lock down later to your domain)
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Unknown body fields are stripped rather than rejected, so arbitrary
  // bodies are still accepted as "ignored".
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
    }),
  );

  app.enableShutdownHooks();
  return app;
}
