import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common';
import type { Response } from 'express';

const MAX = 1000;

function sanitizeString(s: string): string {
  // remove data URL/base64 gigante
  s = s.replace(/data:[\w.+-]+\/[\w.+-]+;base64,[A-Za-z0-9+/=]+/g, '[base64]');
  if (s.length > MAX) s = s.slice(0, MAX) + '…';
  return s;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function redactDeep(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (obj === null || typeof obj !== 'object') {
    return typeof obj === 'string' ? sanitizeString(obj) : obj;
  }
  if (seen.has(obj)) return '[circular]';
  seen.add(obj);

  if (Array.isArray(obj)) return obj.map((v) => redactDeep(v, seen));

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (/base64|file|data|payload/i.test(k)) {
      out[k] = '[redacted]';
    } else {
      out[k] = redactDeep(v, seen);
    }
  }
  return out;
}

/**
 * Corpo no formato padrão do Nest ({ statusCode, message, error }) vira { detail };
 * corpos próprios (com detail ou outro formato) seguem só sanitizados.
 */
export function toErrorBody(body: unknown): unknown {
  if (typeof body === 'string') return { detail: sanitizeString(body) };
  if (isRecord(body) && !('detail' in body) && 'message' in body) {
    const m = body.message;
    const detail = Array.isArray(m) ? m.map((x) => String(x)).join('; ') : String(m ?? '');
    return { detail: sanitizeString(detail) };
  }
  return redactDeep(body);
}

@Catch()
export class RedactExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RedactExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      return res.status(exception.getStatus()).json(toErrorBody(exception.getResponse()));
    }

    const stack = exception instanceof Error ? exception.stack : undefined;
    this.logger.error(`Erro não tratado: ${String(exception)}`, stack);
    return res.status(500).json({ detail: 'Erro interno do servidor.' });
  }
}
