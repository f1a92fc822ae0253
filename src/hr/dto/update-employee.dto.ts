import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDateString,
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
} from 'class-validator';
import { EMPLOYEE_STATUSES, EmployeeStatus } from '../employee.entity';

export class UpdateEmployeeDto {
  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  first_name?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  last_name?: string;

  @ApiPropertyOptional()
  @IsEmail()
  @IsOptional()
  email?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  phone?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  department?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  position?: string;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsPositive()
  @IsOptional()
  salary?: number;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  hire_date?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  manager_id?: string;

  @ApiPropertyOptional({ enum: EMPLOYEE_STATUSES })
  @IsIn(EMPLOYEE_STATUSES)
  @IsOptional()
  status?: EmployeeStatus;
}
