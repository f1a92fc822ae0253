import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsOptional } from 'class-validator';

export class TerminateEmployeeDto {
  @ApiPropertyOptional({ example: '2025-06-30', description: 'Defaults to today' })
  @IsDateString()
  @IsOptional()
  termination_date?: string;
}
