import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { logger } from '../logger/logger.config';

/**
 * Admin routes carry the secret as the `admin_secret_key` query parameter.
 * Runs before interceptors, so a rejected upload is never written to disk.
 */
@Injectable()
export class AdminSecretGuard implements CanActivate {
  private readonly logger = logger();

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.query.admin_secret_key;
    const expected = this.configService.get<string>('ADMIN_SECRET_KEY');

    if (typeof provided !== 'string' || !expected || provided !== expected) {
      this.logger.warn({ path: request.path }, 'Rejected admin request');
      throw new UnauthorizedException('Invalid admin secret key');
    }

    return true;
  }
}
