import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';
import type { Request } from 'express';

/**
 * Admin Token Guard
 *
 * Requires `Authorization: Bearer <ADMIN_TOKEN>`. With no token configured
 * every request is refused.
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  private readonly logger = new Logger(AdminTokenGuard.name);
  private readonly expectedDigest: Buffer | null;

  constructor(configService: ConfigService) {
    const token = configService.get<string>('ADMIN_TOKEN');
    this.expectedDigest = token ? digest(token) : null;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.expectedDigest) {
      this.logger.warn('ADMIN_TOKEN is not set - refusing admin request');
      throw new UnauthorizedException('Admin access is not configured');
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers.authorization ?? '';
    const [scheme, token] = header.split(' ');

    // Compare fixed-length digests so the check takes the same time for any input
    if (scheme !== 'Bearer' || !token || !timingSafeEqual(digest(token), this.expectedDigest)) {
      throw new UnauthorizedException('Invalid admin token');
    }

    return true;
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}
