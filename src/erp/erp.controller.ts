import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateOrderDto } from './dto/create-order.dto';
import { ListOrdersQueryDto } from './dto/list-orders.dto';
import { UpdateOrderStatusDto } from './dto/update-order-status.dto';
import { ErpService } from './erp.service';
import { Order } from './order.entity';

@ApiTags('ERP')
@ApiBearerAuth('api-key')
@Controller('orders')
export class ErpController {
  constructor(private readonly erpService: ErpService) {}

  @Post()
  @ApiOperation({ summary: 'Create an order' })
  @ApiOkResponse({ type: Order })
  create(@Body() dto: CreateOrderDto) {
    return this.erpService.createOrder(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List orders, optionally by status' })
  @ApiOkResponse({ type: [Order] })
  findAll(@Query() query: ListOrdersQueryDto) {
    return query.status
      ? this.erpService.listOrdersByStatus(query.status)
      : this.erpService.listAllOrders();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order by id' })
  @ApiOkResponse({ type: Order })
  findOne(@Param('id') id: string) {
    return this.erpService.getOrderById(id);
  }

  @Patch(':id/status')
  @ApiOperation({ summary: 'Change order status' })
  @ApiOkResponse({ type: Order })
  updateStatus(@Param('id') id: string, @Body() dto: UpdateOrderStatusDto) {
    return this.erpService.updateOrderStatus(id, dto.new_status);
  }
}
