import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export const ORDER_STATUSES = ['pending', 'processing', 'shipped', 'delivered', 'cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const ORDER_PRIORITIES = ['low', 'medium', 'high'] as const;
export type OrderPriority = (typeof ORDER_PRIORITIES)[number];

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

export class OrderItem {
  @ApiProperty({ example: 'Widget' })
  name!: string;

  @ApiProperty({ example: 2, minimum: 1 })
  quantity!: number;

  @ApiProperty({ example: 49.5 })
  price!: number;
}

export class Order {
  @ApiProperty({ example: 'ORD-20250101-001' })
  id!: string;

  @ApiProperty({ example: '3f0c2d4e-8d1b-4f6a-9a55-0b1d6a7c2e10' })
  client_id!: string;

  @ApiProperty({ type: [OrderItem] })
  items!: OrderItem[];

  @ApiProperty({ example: 99 })
  total_amount!: number;

  @ApiProperty({ enum: ORDER_STATUSES })
  status!: OrderStatus;

  @ApiPropertyOptional()
  description?: string;

  @ApiProperty({ enum: ORDER_PRIORITIES, default: 'medium' })
  priority!: OrderPriority;

  @ApiPropertyOptional()
  notes?: string;

  @ApiProperty()
  created_at!: string;

  @ApiProperty()
  updated_at!: string;
}
