import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { ApiKeyPolicy, appConfig } from '../../config/app.config';
import { AppContextService } from '../context/app-context.service';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { AuthErrors } from '../errors/auth.errors';

interface QuotaWindow {
  hour: number;
  count: number;
}

const HOUR_MS = 3_600_000;

/**
 * Bearer API key check with an hourly request quota per key. Quotas reset at
 * the start of every clock hour and live in process memory.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly policies: Map<string, ApiKeyPolicy>;
  private readonly usage = new Map<string, QuotaWindow>();

  constructor(
    private readonly reflector: Reflector,
    private readonly appContext: AppContextService,
    @Inject(appConfig.KEY)
    config: ConfigType<typeof appConfig>,
  ) {
    this.policies = new Map(config.apiKeys.map((policy) => [policy.key, policy]));
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();

    const key = this.extractKey(req);
    if (!key) {
      throw new UnauthorizedException(AuthErrors.API_KEY_MISSING);
    }

    const policy = this.policies.get(key);
    if (!policy) {
      this.logger.warn(
        ['api_key_rejected', `ip=${this.appContext.getIp() ?? '-'}`, `${req.method} ${req.url}`].join(' | '),
      );
      throw new UnauthorizedException(AuthErrors.API_KEY_INVALID);
    }

    const hour = Math.floor(Date.now() / HOUR_MS);
    const window = this.usage.get(key);
    const used = window && window.hour === hour ? window.count : 0;

    res.setHeader('X-Rate-Limit-Limit', String(policy.requestsPerHour));

    if (used >= policy.requestsPerHour) {
      res.setHeader('X-Rate-Limit-Remaining', '0');
      this.logger.warn(
        ['rate_limited', `tier=${policy.tier}`, `used=${used}`, `limit=${policy.requestsPerHour}`].join(' | '),
      );
      throw new HttpException(AuthErrors.RATE_LIMIT_EXCEEDED, HttpStatus.TOO_MANY_REQUESTS);
    }

    this.usage.set(key, { hour, count: used + 1 });
    res.setHeader('X-Rate-Limit-Remaining', String(policy.requestsPerHour - used - 1));
    this.appContext.setCaller(key, policy.tier);
    return true;
  }

  private extractKey(req: Request): string | undefined {
    const header = req.headers.authorization;
    if (typeof header !== 'string') {
      return undefined;
    }
    const match = header.match(/^Bearer\s+(.+)$/i);
    const key = match?.[1].trim();
    return key ? key : undefined;
  }
}
