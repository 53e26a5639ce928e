// src/main.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { json, urlencoded } from 'express';
import compression from 'compression';
import { AppModule } from './app.module';
import { configureApp, resolvePrefix } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  const logger = new Logger('Bootstrap');
  const config = app.get(ConfigService);

  const port = Number(config.get<string>('PORT') ?? 3001);
  const prefix = resolvePrefix(config.get<string>('API_PREFIX'));

  // Body limit dos campos não-multipart
  const bodyLimit = config.get<string>('BODY_LIMIT') ?? '50mb';
  app.use(json({ limit: bodyLimit }));
  app.use(urlencoded({ limit: bodyLimit, extended: true }));

  app.use(compression());

  // trust proxy (se estiver atrás de proxy/ingress)
  if ((config.get<string>('TRUST_PROXY') ?? '').toLowerCase() === 'true') {
    app.set('trust proxy', 1);
  }

  // CORS: "*" por padrão, lista separada por vírgula; entradas com ^ são regex
  const allowlist = (config.get<string>('CORS_ORIGINS') ?? '*')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  app.enableCors({
    origin: (origin, cb) => {
      if (!origin) return cb(null, true); // curl/postman
      if (allowlist.includes('*')) return cb(null, true);

      const ok = allowlist.some((o) => {
        if (o.startsWith('^')) {
          try {
            return new RegExp(o).test(origin);
          } catch {
            return false;
          }
        }
        return o === origin;
      });
      return cb(ok ? null : new Error(`CORS: origem não permitida: ${origin}`), ok);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    exposedHeaders: ['Content-Disposition'],
    maxAge: 600,
  });

  configureApp(app, prefix);

  // ---------- Swagger (ligado por padrão fora de produção) ----------
  const isProd = config.get<string>('NODE_ENV') === 'production';
  const enableSwagger =
    (config.get<string>('ENABLE_SWAGGER') ?? (isProd ? 'false' : 'true')).toLowerCase() === 'true';

  if (enableSwagger) {
    const cfg = new DocumentBuilder()
      .setTitle('Leitor de Planilhas API')
      .setDescription('Filtra planilhas de contratos por status de auditoria e marca duplicados.')
      .setVersion(config.get<string>('npm_package_version') ?? '1.0.0')
      .addServer(`/${prefix}`, 'Base com prefixo global')
      .build();

    const document = SwaggerModule.createDocument(app, cfg, { deepScanRoutes: true });
    const docsMount = String(config.get<string>('SWAGGER_PATH') ?? 'docs').replace(/^\/+/, '');
    SwaggerModule.setup(docsMount, app, document, { useGlobalPrefix: true });

    logger.log(`Swagger docs:  http://localhost:${port}/${prefix}/${docsMount}`);
  }

  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');

  logger.log(`API running on http://localhost:${port}/${prefix}`);
  logger.log(`CORS allowlist: ${allowlist.join(', ')}`);
  logger.log(`Body limit: ${bodyLimit}`);
}

bootstrap().catch((err: unknown) => {
  const stack = err instanceof Error ? err.stack : String(err);
  new Logger('Bootstrap').error('Falha ao iniciar a API', stack);
  process.exit(1);
});
