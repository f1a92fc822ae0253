// src/common/context/app-context.service.ts
import { Injectable } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from './cls-store.type';

@Injectable()
export class AppContextService {
  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  // ---- Caller ----
  setCaller(apiKey: string, tier: string) {
    this.cls.set('apiKey', apiKey);
    this.cls.set('tier', tier);
  }

  getTier(): string | undefined {
    return this.cls.get('tier');
  }

  /** Key with everything but the first four characters masked, for logs. */
  getMaskedApiKey(): string | undefined {
    const key = this.cls.get('apiKey');
    return key ? `${key.slice(0, 4)}***` : undefined;
  }

  // ---- Correlation / meta ----
  setCorrelationId(correlationId: string) {
    this.cls.set('correlationId', correlationId);
  }

  getCorrelationId(): string | undefined {
    return this.cls.get('correlationId');
  }

  getIp(): string | undefined {
    return this.cls.get('ip');
  }

  getUserAgent(): string | undefined {
    return this.cls.get('userAgent');
  }
}
