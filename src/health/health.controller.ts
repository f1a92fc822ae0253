import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../common/decorators/public.decorator';
import { ToolRegistryService } from '../agent/tools/tool-registry.service';
import { RequestInterpreter } from '../agent/interpreters/request-interpreter';

@ApiTags('Health')
@Public()
@Controller('health')
export class HealthController {
  constructor(
    private readonly registry: ToolRegistryService,
    private readonly interpreter: RequestInterpreter,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness check (no API key required)' })
  check() {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime_seconds: Math.round(process.uptime()),
      interpreter: this.interpreter.kind,
      tools_loaded: this.registry.getNames().length,
    };
  }
}
