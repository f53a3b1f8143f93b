import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response } from 'express';
import type { AppConfig } from '../../config/env.validation';

export const BASIC_AUTH_CHALLENGE = 'Basic realm="Hashdrop", charset="UTF-8"';

export interface BasicCredentials {
  user: string;
  pass: string;
}

export function parseBasicAuth(header?: string): BasicCredentials | null {
  if (!header) return null;
  const [scheme, encoded] = header.trim().split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== 'basic' || !encoded) return null;

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const idx = decoded.indexOf(':');
  if (idx < 0) return null;
  return { user: decoded.slice(0, idx), pass: decoded.slice(idx + 1) };
}

function safeEqual(a: string, b: string): boolean {
  // Hash first so both sides have the same length.
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

/** Gates uploads behind HTTP basic auth when a username and password are configured. */
@Injectable()
export class BasicAuthGuard implements CanActivate {
  private readonly logger = new Logger(BasicAuthGuard.name);
  private readonly expected: BasicCredentials | null;

  constructor(config: ConfigService<AppConfig, true>) {
    const user = config.get('AUTH_USERNAME', { infer: true });
    const pass = config.get('AUTH_PASSWORD', { infer: true });
    this.expected = user && pass ? { user, pass } : null;
  }

  get enabled(): boolean {
    return this.expected !== null;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.expected) {
      return true;
    }

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const credentials = parseBasicAuth(req.headers.authorization);

    if (!credentials) {
      this.logger.debug("Couldn't parse basic auth");
    } else if (safeEqual(credentials.user, this.expected.user) && safeEqual(credentials.pass, this.expected.pass)) {
      return true;
    } else {
      this.logger.warn('Incorrect authentication provided');
    }

    http.getResponse<Response>().setHeader('WWW-Authenticate', BASIC_AUTH_CHALLENGE);
    throw new UnauthorizedException('Unauthorized');
  }
}
