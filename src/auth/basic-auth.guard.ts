/**
 * HTTP Basic auth over every route except those marked @Public().
 * Active only when both BASIC_AUTH_USERNAME and BASIC_AUTH_PASSWORD are set.
 */

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  SetMetadata,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'node:crypto';
import type { Request, Response } from 'express';

export const IS_PUBLIC = 'isPublic';
export const Public = () => SetMetadata(IS_PUBLIC, true);

const REALM = 'Renholdsplan';

interface Credentials {
  username: string;
  password: string;
}

export function parseBasicAuth(header: string | undefined): Credentials | null {
  if (!header || !header.startsWith('Basic ')) return null;
  const decoded = Buffer.from(header.slice('Basic '.length).trim(), 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

@Injectable()
export class BasicAuthGuard implements CanActivate {
  private readonly logger = new Logger(BasicAuthGuard.name);
  private readonly expected: Credentials | null;

  constructor(
    private readonly reflector: Reflector,
    config: ConfigService,
  ) {
    const username = config.get<string>('BASIC_AUTH_USERNAME');
    const password = config.get<string>('BASIC_AUTH_PASSWORD');
    this.expected = username && password ? { username, password } : null;
    this.logger.log(this.expected ? 'Basic auth enabled' : 'Basic auth disabled (no credentials configured)');
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.expected) return true;
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const http = context.switchToHttp();
    const provided = parseBasicAuth(http.getRequest<Request>().headers.authorization);
    if (
      provided &&
      safeEqual(provided.username, this.expected.username) &&
      safeEqual(provided.password, this.expected.password)
    ) {
      return true;
    }
    http.getResponse<Response>().setHeader('WWW-Authenticate', `Basic realm="${REALM}"`);
    throw new UnauthorizedException();
  }
}
