// src/common/context/app-context.module.ts
import { Global, Module } from '@nestjs/common';
import type { Request } from 'express';
import { ClsModule } from 'nestjs-cls';
import { AppContextService } from './app-context.service';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw && raw.trim().length > 0 ? raw.trim() : undefined;
}

/**
 * Request-scoped context: client ip, user agent and correlation id are set by
 * the CLS middleware; the API key guard adds the caller.
 */
@Global()
@Module({
  imports: [
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        setup: (cls, req: Request) => {
          const ip =
            firstHeader(req.headers['x-forwarded-for'])?.split(',')[0]?.trim() ||
            req.socket.remoteAddress ||
            undefined;

          cls.set('ip', ip);
          cls.set('userAgent', firstHeader(req.headers['user-agent']));

          const headerCorrelationId =
            firstHeader(req.headers['x-correlation-id']) ?? firstHeader(req.headers['x-request-id']);
          cls.set('correlationId', headerCorrelationId ?? cls.getId());
        },
      },
    }),
  ],
  providers: [AppContextService],
  exports: [AppContextService],
})
export class AppContextModule {}
