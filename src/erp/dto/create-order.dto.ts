import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { ORDER_PRIORITIES, OrderPriority } from '../order.entity';
import { CreateOrderItemDto } from './create-order-item.dto';

export class CreateOrderDto {
  @ApiProperty({ example: '3f0c2d4e-8d1b-4f6a-9a55-0b1d6a7c2e10' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  client_id!: string;

  @ApiProperty({ type: [CreateOrderItemDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CreateOrderItemDto)
  items!: CreateOrderItemDto[];

  @ApiProperty({ example: 99, description: 'Must equal the sum of quantity x price' })
  @Type(() => Number)
  @IsPositive()
  total_amount!: number;

  @ApiPropertyOptional({ example: 'Quarterly restock' })
  @IsString()
  @MaxLength(1000)
  @IsOptional()
  description?: string;

  @ApiPropertyOptional({ enum: ORDER_PRIORITIES, default: 'medium' })
  @IsIn(ORDER_PRIORITIES)
  @IsOptional()
  priority?: OrderPriority;

  @ApiPropertyOptional()
  @IsString()
  @MaxLength(1000)
  @IsOptional()
  notes?: string;
}
