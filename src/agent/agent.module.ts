import { HttpModule, HttpService } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { appConfig } from '../config/app.config';
import { CrmModule } from '../crm/crm.module';
import { ErpModule } from '../erp/erp.module';
import { HrModule } from '../hr/hr.module';
import { SecurityModule } from '../security/security.module';
import { AgentController } from './agent.controller';
import { AgentService } from './agent.service';
import { LlmInterpreter } from './interpreters/llm.interpreter';
import { PatternInterpreter } from './interpreters/pattern.interpreter';
import { RequestInterpreter } from './interpreters/request-interpreter';
import { ToolRegistryService } from './tools/tool-registry.service';
import { ToolService } from './tools/tool.service';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [appConfig.KEY],
      useFactory: (config: ConfigType<typeof appConfig>) => ({
        timeout: config.llm.timeoutMs,
        maxRedirects: 3,
        httpAgent: new HttpAgent({ keepAlive: true }),
        httpsAgent: new HttpsAgent({ keepAlive: true }),
      }),
    }),
    CrmModule,
    ErpModule,
    HrModule,
    SecurityModule,
  ],
  controllers: [AgentController],
  providers: [
    ToolRegistryService,
    ToolService,
    {
      provide: RequestInterpreter,
      inject: [appConfig.KEY, HttpService, ToolRegistryService],
      useFactory: (
        config: ConfigType<typeof appConfig>,
        http: HttpService,
        registry: ToolRegistryService,
      ): RequestInterpreter =>
        config.interpreter === 'llm'
          ? new LlmInterpreter(http, registry, config)
          : new PatternInterpreter(),
    },
    AgentService,
  ],
  exports: [AgentService, ToolService, ToolRegistryService, RequestInterpreter],
})
export class AgentModule {}
