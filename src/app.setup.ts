import { INestApplication } from '@nestjs/common';
import { DomainExceptionFilter } from './common/domain-exception.filter';

/** Shared by the server entry point and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalFilters(new DomainExceptionFilter());
  return app;
}
