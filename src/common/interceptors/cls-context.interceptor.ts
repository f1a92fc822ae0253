// src/common/interceptors/cls-context.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import { AppContextService } from '../context/app-context.service';

@Injectable()
export class ClsContextInterceptor implements NestInterceptor {
  private readonly logger = new Logger(ClsContextInterceptor.name);

  constructor(
    private readonly appContext: AppContextService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const httpCtx = context.switchToHttp();
    const req = httpCtx.getRequest<Request>();
    const res = httpCtx.getResponse<Response>();

    const { method, url } = req;
    const start = Date.now();

    const existing = this.appContext.getCorrelationId();
    const correlationId =
      typeof existing === 'string' && existing.trim().length > 0 ? existing : uuidv4();
    this.appContext.setCorrelationId(correlationId);
    res.setHeader('x-correlation-id', correlationId);

    // the guard has already run, so the caller is known here
    const ip = this.appContext.getIp();
    const tier = this.appContext.getTier();
    const apiKey = this.appContext.getMaskedApiKey();
    const userAgent = this.appContext.getUserAgent();

    return next.handle().pipe(
      tap(() => {
        const ms = Date.now() - start;

        this.logger.log(
          [
            `corrId=${correlationId}`,
            `key=${apiKey ?? '-'}`,
            `tier=${tier ?? '-'}`,
            `ip=${ip ?? '-'}`,
            `ua=${userAgent ?? '-'}`,
            `${method} ${url}`,
            `${res.statusCode}`,
            `+${ms}ms`,
          ].join(' | '),
        );
      }),
    );
  }
}
