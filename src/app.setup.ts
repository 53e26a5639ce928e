import { INestApplication, ValidationPipe } from '@nestjs/common';
import { RedactExceptionFilter } from './common/filters/redact-exception.filter';

/** Prefixo sanitizado (sem barra inicial). */
export function resolvePrefix(raw?: string): string {
  return String(raw ?? 'api').replace(/^\/+/, '') || 'api';
}

/** Pipes e filtros globais; usados pelo bootstrap e pelos testes e2e. */
export function configureApp(app: INestApplication, prefix: string): void {
  app.setGlobalPrefix(prefix);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      // não reflete o payload nos erros de DTO
      validationError: { target: false, value: false },
    }),
  );

  // sanitiza respostas de erro e garante o campo "detail"
  app.useGlobalFilters(new RedactExceptionFilter());
}
