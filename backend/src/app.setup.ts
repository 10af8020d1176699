import { INestApplication, ValidationPipe } from '@nestjs/common';
import { PersistenceExceptionFilter } from './common/filters/persistence-exception.filter';

export interface AppSetupOptions {
  corsOrigins?: string[];
  globalPrefix?: string;
}

// Shared by the HTTP bootstrap and the end-to-end tests
export function configureApp(app: INestApplication, options: AppSetupOptions = {}): INestApplication {
  if (options.corsOrigins) {
    app.enableCors({
      origin: options.corsOrigins,
      credentials: true,
    });
  }

  // Requête rejetée en entier au premier champ invalide
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
    stopAtFirstError: true,
  }));

  app.useGlobalFilters(new PersistenceExceptionFilter());

  if (options.globalPrefix) {
    app.setGlobalPrefix(options.globalPrefix);
  }

  return app;
}
