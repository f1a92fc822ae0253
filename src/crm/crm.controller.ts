import { Body, Controller, Delete, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Client } from './client.entity';
import { CrmService } from './crm.service';
import { CreateClientDto } from './dto/create-client.dto';
import { FilterClientsQueryDto } from './dto/filter-clients.dto';
import { UpdateClientBalanceDto } from './dto/update-client-balance.dto';
import { UpdateClientDto } from './dto/update-client.dto';

@ApiTags('CRM')
@ApiBearerAuth('api-key')
@Controller('clients')
export class CrmController {
  constructor(private readonly crmService: CrmService) {}

  @Post()
  @ApiOperation({ summary: 'Create a client' })
  @ApiOkResponse({ type: Client })
  create(@Body() dto: CreateClientDto) {
    return this.crmService.createClient(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List clients, optionally by balance range or search text' })
  @ApiOkResponse({ type: [Client] })
  findAll(@Query() query: FilterClientsQueryDto) {
    if (query.q !== undefined) {
      return this.crmService.searchClients(query.q);
    }
    if (query.min_balance !== undefined || query.max_balance !== undefined) {
      return this.crmService.filterClientsByBalance(query.min_balance, query.max_balance);
    }
    return this.crmService.listAllClients();
  }

  @Get('stats')
  @ApiOperation({ summary: 'Client counts and balance totals' })
  statistics() {
    return this.crmService.getClientStatistics();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a client by id' })
  @ApiOkResponse({ type: Client })
  findOne(@Param('id') id: string) {
    return this.crmService.getClientById(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update client details' })
  @ApiOkResponse({ type: Client })
  update(@Param('id') id: string, @Body() dto: UpdateClientDto) {
    return this.crmService.updateClient(id, dto);
  }

  @Patch(':id/balance')
  @ApiOperation({ summary: 'Set a client balance' })
  @ApiOkResponse({ type: Client })
  updateBalance(@Param('id') id: string, @Body() dto: UpdateClientBalanceDto) {
    return this.crmService.updateClientBalance(id, dto.new_balance);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a client' })
  remove(@Param('id') id: string) {
    return this.crmService.deleteClient(id);
  }
}
