import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { AgentModule } from './agent/agent.module';
import { AppContextModule } from './common/context/app-context.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { ApiKeyGuard } from './common/guards/api-key.guard';
import { ClsContextInterceptor } from './common/interceptors/cls-context.interceptor';
import { appConfig } from './config/app.config';
import { CrmModule } from './crm/crm.module';
import { ErpModule } from './erp/erp.module';
import { HealthModule } from './health/health.module';
import { HrModule } from './hr/hr.module';
import { SecurityModule } from './security/security.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),

    AppContextModule,
    SecurityModule,
    CrmModule,
    ErpModule,
    HrModule,
    AgentModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: ClsContextInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule {}
