import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export const EMPLOYEE_STATUSES = ['active', 'inactive', 'terminated'] as const;
export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

export class Employee {
  @ApiProperty({ example: '7b1d4c52-0f2a-4c3e-8e9b-5a6d7c8e9f01' })
  id!: string;

  @ApiProperty({ example: 'EMP001' })
  employee_id!: string;

  @ApiProperty({ example: 'Jane' })
  first_name!: string;

  @ApiProperty({ example: 'Doe' })
  last_name!: string;

  @ApiProperty({ example: 'jane.doe@company.example' })
  email!: string;

  @ApiPropertyOptional()
  phone?: string;

  @ApiProperty({ example: 'Engineering' })
  department!: string;

  @ApiProperty({ example: 'Software Engineer' })
  position!: string;

  @ApiProperty({ example: 85000 })
  salary!: number;

  @ApiProperty({ example: '2024-03-01' })
  hire_date!: string;

  @ApiPropertyOptional()
  manager_id?: string;

  @ApiProperty({ enum: EMPLOYEE_STATUSES, default: 'active' })
  status!: EmployeeStatus;

  @ApiPropertyOptional({ example: '2025-06-30' })
  termination_date?: string;

  @ApiProperty()
  created_at!: string;

  @ApiProperty()
  updated_at!: string;
}

export class Department {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'Engineering' })
  name!: string;

  @ApiProperty({ example: 'ENG' })
  code!: string;

  @ApiPropertyOptional()
  description?: string;

  @ApiPropertyOptional()
  manager_id?: string;

  @ApiPropertyOptional({ example: 1200000 })
  budget?: number;

  @ApiProperty()
  created_at!: string;

  @ApiProperty()
  updated_at!: string;
}

export class PerformanceReview {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'EMP001' })
  employee_id!: string;

  @ApiProperty({ example: 'EMP000' })
  reviewer_id!: string;

  @ApiProperty({ example: '2025-06-30' })
  review_date!: string;

  @ApiProperty({ example: '2025-H1' })
  review_period!: string;

  @ApiProperty({ minimum: 1, maximum: 5, example: 4 })
  overall_rating!: number;

  @ApiProperty()
  comments!: string;

  @ApiProperty({ type: [String] })
  goals!: string[];

  @ApiProperty()
  created_at!: string;
}

export interface EmployeeFilters {
  department?: string;
  status?: EmployeeStatus;
  position?: string;
}

export interface SalaryBreakdown {
  total: number;
  average: number;
  count: number;
}

export interface SalaryReport {
  total_payroll: number;
  average_salary: number;
  employee_count: number;
  department_breakdown: Record<string, SalaryBreakdown>;
  position_breakdown: Record<string, SalaryBreakdown>;
}

export interface OrganizationalChart {
  total_employees: number;
  active_employees: number;
  departments: {
    department: Department;
    employee_count: number;
    employees: Employee[];
  }[];
}
