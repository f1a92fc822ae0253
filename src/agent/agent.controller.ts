import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AGENT_EXAMPLES } from './agent.examples';
import { AgentService } from './agent.service';
import { ProcessCommandDto } from './dto/process-command.dto';
import { ToolRegistryService } from './tools/tool-registry.service';

@ApiTags('Agent')
@ApiBearerAuth('api-key')
@Controller('agent')
export class AgentController {
  constructor(
    private readonly agent: AgentService,
    private readonly registry: ToolRegistryService,
  ) {}

  @Post('process')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Interpret a natural-language command and run the matching tool' })
  process(@Body() body: ProcessCommandDto) {
    return this.agent.processUserRequest(body.command);
  }

  @Get('tools')
  @ApiOperation({ summary: 'Registered tools grouped by domain' })
  tools() {
    const categories = this.registry.categorize();
    return {
      total: this.registry.getNames().length,
      categories,
    };
  }

  @Get('examples')
  @ApiOperation({ summary: 'Sample commands per domain' })
  examples() {
    return AGENT_EXAMPLES;
  }

  @Get('history')
  @ApiOperation({ summary: 'Conversation history of this process' })
  history() {
    return this.agent.getConversationHistory();
  }

  @Delete('history')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Clear the conversation history' })
  clearHistory() {
    this.agent.clearConversationHistory();
  }
}
