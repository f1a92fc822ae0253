import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsNumber, IsOptional, IsString, Min } from 'class-validator';

export class FilterClientsQueryDto {
  @ApiPropertyOptional({ example: 1000, description: 'Inclusive lower balance bound' })
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  min_balance?: number;

  @ApiPropertyOptional({ example: 10000, description: 'Inclusive upper balance bound' })
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  max_balance?: number;

  @ApiPropertyOptional({ example: 'acme', description: 'Matches name, email or company' })
  @IsString()
  @IsOptional()
  q?: string;
}
