import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDateString,
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
} from 'class-validator';
import { EMPLOYEE_STATUSES, EmployeeStatus } from '../employee.entity';

export class CreateEmployeeDto {
  @ApiProperty({ example: 'EMP001' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  employee_id!: string;

  @ApiProperty({ example: 'Jane' })
  @IsString()
  @IsNotEmpty()
  first_name!: string;

  @ApiProperty({ example: 'Doe' })
  @IsString()
  @IsNotEmpty()
  last_name!: string;

  @ApiProperty({ example: 'jane.doe@company.example' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  phone?: string;

  @ApiProperty({ example: 'Engineering' })
  @IsString()
  @IsNotEmpty()
  department!: string;

  @ApiProperty({ example: 'Software Engineer' })
  @IsString()
  @IsNotEmpty()
  position!: string;

  @ApiProperty({ example: 85000 })
  @Type(() => Number)
  @IsPositive()
  salary!: number;

  @ApiProperty({ example: '2024-03-01' })
  @IsDateString()
  hire_date!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  manager_id?: string;

  @ApiPropertyOptional({ enum: EMPLOYEE_STATUSES, default: 'active' })
  @IsIn(EMPLOYEE_STATUSES)
  @IsOptional()
  status?: EmployeeStatus;
}
