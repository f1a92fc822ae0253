import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { TerminateEmployeeDto } from '../../../hr/dto/terminate-employee.dto';
import { UpdateEmployeeDto } from '../../../hr/dto/update-employee.dto';
import { EMPLOYEE_STATUSES, EmployeeStatus } from '../../../hr/employee.entity';

export class EmployeeIdParams {
  @IsString()
  @IsNotEmpty()
  employee_id!: string;
}

export class UpdateEmployeeParams extends UpdateEmployeeDto {
  @IsString()
  @IsNotEmpty()
  employee_id!: string;
}

export class TerminateEmployeeParams extends TerminateEmployeeDto {
  @IsString()
  @IsNotEmpty()
  employee_id!: string;
}

// no free-text `q` here: that is search_employees
export class ListEmployeesParams {
  @IsString()
  @IsOptional()
  department?: string;

  @IsIn(EMPLOYEE_STATUSES)
  @IsOptional()
  status?: EmployeeStatus;

  @IsString()
  @IsOptional()
  position?: string;
}

export class DepartmentParams {
  @IsString()
  @IsNotEmpty()
  department!: string;
}
