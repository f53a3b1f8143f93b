import type { NextFunction, Request, Response } from 'express';
import type { RequestWithId } from './request-id.middleware';

const SLOW_REQUEST_MS = 1000;

export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string' && forwarded.trim()) {
    return forwarded.split(',')[0].trim();
  }
  if (Array.isArray(forwarded) && forwarded.length) {
    return forwarded[0];
  }
  const realIp = req.headers['x-real-ip'];
  if (typeof realIp === 'string' && realIp.trim()) {
    return realIp.trim();
  }
  return req.ip || req.socket?.remoteAddress || '';
}

function headerBytes(value: string | number | string[] | undefined): number {
  const parsed = Number(Array.isArray(value) ? value[0] : value ?? 0);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export function requestLogMiddleware(req: RequestWithId, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  res.on('finish', () => {
    const durationNs = process.hrtime.bigint() - startedAt;
    const durationMs = Number(durationNs) / 1_000_000;

    const payload = {
      level: res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info',
      message: 'http_request',
      timestamp: new Date().toISOString(),
      requestId:
        req.requestId ||
        (typeof req.headers['x-request-id'] === 'string'
          ? req.headers['x-request-id']
          : undefined),
      method: req.method,
      path: req.originalUrl || req.url,
      status: res.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
      requestBytes: headerBytes(req.headers['content-length']),
      responseBytes: headerBytes(res.getHeader('content-length')),
      slow: durationMs > SLOW_REQUEST_MS ? true : undefined,
      ip: getClientIp(req),
      userAgent: req.get('user-agent') || undefined
    };

    const line = `${JSON.stringify(payload)}\n`;
    if (res.statusCode >= 500) {
      process.stderr.write(line);
      return;
    }
    process.stdout.write(line);
  });

  next();
}
