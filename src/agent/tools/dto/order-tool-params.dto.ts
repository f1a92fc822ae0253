import { IsIn, IsNotEmpty, IsString } from 'class-validator';
import { UpdateOrderStatusDto } from '../../../erp/dto/update-order-status.dto';
import { ORDER_STATUSES, OrderStatus } from '../../../erp/order.entity';

export class OrderIdParams {
  @IsString()
  @IsNotEmpty()
  order_id!: string;
}

export class UpdateOrderStatusParams extends UpdateOrderStatusDto {
  @IsString()
  @IsNotEmpty()
  order_id!: string;
}

export class FilterOrdersByStatusParams {
  @IsIn(ORDER_STATUSES)
  status!: OrderStatus;
}
