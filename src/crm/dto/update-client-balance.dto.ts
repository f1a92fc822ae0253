import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsNumber, Min } from 'class-validator';

export class UpdateClientBalanceDto {
  @ApiProperty({ example: 5000, minimum: 0 })
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  new_balance!: number;
}
