import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { EMPLOYEE_STATUSES, EmployeeStatus } from '../employee.entity';

export class ListEmployeesQueryDto {
  @ApiPropertyOptional({ example: 'Engineering' })
  @IsString()
  @IsOptional()
  department?: string;

  @ApiPropertyOptional({ enum: EMPLOYEE_STATUSES })
  @IsIn(EMPLOYEE_STATUSES)
  @IsOptional()
  status?: EmployeeStatus;

  @ApiPropertyOptional({ example: 'Software Engineer' })
  @IsString()
  @IsOptional()
  position?: string;

  @ApiPropertyOptional({ description: 'Matches name, email or position' })
  @IsString()
  @IsOptional()
  q?: string;
}
