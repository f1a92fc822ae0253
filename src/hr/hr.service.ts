import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DepartmentErrors, EmployeeErrors } from '../common/errors/employee.errors';
import { touchedAt } from '../common/utils/timestamp';
import { Store } from '../storage/store';
import { DEPARTMENT_STORE, EMPLOYEE_STORE, REVIEW_STORE } from '../storage/storage.tokens';
import { CreateDepartmentDto } from './dto/create-department.dto';
import { CreateEmployeeDto } from './dto/create-employee.dto';
import { CreatePerformanceReviewDto } from './dto/create-performance-review.dto';
import { UpdateEmployeeDto } from './dto/update-employee.dto';
import {
  Department,
  Employee,
  EmployeeFilters,
  OrganizationalChart,
  PerformanceReview,
  SalaryBreakdown,
  SalaryReport,
} from './employee.entity';

const UPDATABLE_FIELDS = [
  'first_name',
  'last_name',
  'email',
  'phone',
  'department',
  'position',
  'salary',
  'hire_date',
  'manager_id',
  'status',
] as const;

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

const sameEmployeeId = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

function matchesEmployee(employee: Employee, ref: string): boolean {
  return employee.id === ref || sameEmployeeId(employee.employee_id, ref);
}

function breakdown(groups: Map<string, number[]>): Record<string, SalaryBreakdown> {
  const result: Record<string, SalaryBreakdown> = {};
  for (const [key, salaries] of groups) {
    const total = salaries.reduce((sum, s) => sum + s, 0);
    result[key] = { total, average: total / salaries.length, count: salaries.length };
  }
  return result;
}

function pushGroup(groups: Map<string, number[]>, key: string, value: number) {
  const bucket = groups.get(key);
  if (bucket) {
    bucket.push(value);
  } else {
    groups.set(key, [value]);
  }
}

@Injectable()
export class HrService {
  private readonly logger = new Logger(HrService.name);

  constructor(
    @Inject(EMPLOYEE_STORE)
    private readonly employees: Store<Employee>,
    @Inject(DEPARTMENT_STORE)
    private readonly departments: Store<Department>,
    @Inject(REVIEW_STORE)
    private readonly reviews: Store<PerformanceReview>,
  ) {}

  // --- employees ---

  async createEmployee(dto: CreateEmployeeDto): Promise<Employee> {
    const employee = await this.employees.update((employees) => {
      if (employees.some((e) => sameEmployeeId(e.employee_id, dto.employee_id))) {
        throw new ConflictException(EmployeeErrors.EMPLOYEE_ID_IN_USE);
      }

      const now = new Date().toISOString();
      const created: Employee = {
        id: uuidv4(),
        employee_id: dto.employee_id,
        first_name: dto.first_name,
        last_name: dto.last_name,
        email: dto.email.trim().toLowerCase(),
        ...(dto.phone !== undefined && { phone: dto.phone }),
        department: dto.department,
        position: dto.position,
        salary: dto.salary,
        hire_date: dto.hire_date,
        ...(dto.manager_id !== undefined && { manager_id: dto.manager_id }),
        status: dto.status ?? 'active',
        created_at: now,
        updated_at: now,
      };
      employees.push(created);
      return created;
    });

    this.logger.log(
      `employee_created | employee_id=${employee.employee_id} | name=${employee.first_name} ${employee.last_name}`,
    );
    return employee;
  }

  async getEmployee(ref: string): Promise<Employee> {
    const employees = await this.employees.load();
    return this.findEmployeeIn(employees, ref);
  }

  async updateEmployee(ref: string, dto: UpdateEmployeeDto): Promise<Employee> {
    const fields = UPDATABLE_FIELDS.filter((field) => dto[field] !== undefined);
    if (fields.length === 0) {
      throw new BadRequestException(EmployeeErrors.EMPLOYEE_UPDATE_EMPTY);
    }

    const employee = await this.employees.update((employees) => {
      const current = this.findEmployeeIn(employees, ref);
      const updated: Employee = { ...current, updated_at: touchedAt(current.updated_at) };
      for (const field of fields) {
        Object.assign(updated, { [field]: dto[field] });
      }
      if (dto.email !== undefined) {
        updated.email = dto.email.trim().toLowerCase();
      }
      employees[employees.indexOf(current)] = updated;
      return updated;
    });

    this.logger.log(`employee_updated | employee_id=${employee.employee_id} | fields=${fields.join(',')}`);
    return employee;
  }

  async terminateEmployee(ref: string, terminationDate?: string): Promise<Employee> {
    const employee = await this.employees.update((employees) => {
      const current = this.findEmployeeIn(employees, ref);
      if (current.status === 'terminated') {
        throw new ConflictException(EmployeeErrors.EMPLOYEE_ALREADY_TERMINATED);
      }
      const updated: Employee = {
        ...current,
        status: 'terminated',
        termination_date: terminationDate ?? isoDate(new Date()),
        updated_at: touchedAt(current.updated_at),
      };
      employees[employees.indexOf(current)] = updated;
      return updated;
    });

    this.logger.log(
      `employee_terminated | employee_id=${employee.employee_id} | date=${employee.termination_date}`,
    );
    return employee;
  }

  async listEmployees(filters: EmployeeFilters = {}): Promise<Employee[]> {
    const employees = await this.employees.load();
    return employees.filter(
      (e) =>
        (filters.department === undefined ||
          e.department.toLowerCase() === filters.department.toLowerCase()) &&
        (filters.status === undefined || e.status === filters.status) &&
        (filters.position === undefined ||
          e.position.toLowerCase() === filters.position.toLowerCase()),
    );
  }

  async searchEmployees(query: string): Promise<Employee[]> {
    const needle = (query ?? '').trim().toLowerCase();
    if (!needle) {
      throw new BadRequestException(EmployeeErrors.EMPLOYEE_SEARCH_QUERY_EMPTY);
    }
    const employees = await this.employees.load();
    return employees.filter((e) =>
      [`${e.first_name} ${e.last_name}`, e.email, e.position].some((value) =>
        (value ?? '').toLowerCase().includes(needle),
      ),
    );
  }

  // --- departments ---

  async createDepartment(dto: CreateDepartmentDto): Promise<Department> {
    const department = await this.departments.update((departments) => {
      if (departments.some((d) => d.code === dto.code)) {
        throw new ConflictException(DepartmentErrors.DEPARTMENT_CODE_IN_USE);
      }
      const now = new Date().toISOString();
      const created: Department = {
        id: uuidv4(),
        name: dto.name,
        code: dto.code,
        ...(dto.description !== undefined && { description: dto.description }),
        ...(dto.manager_id !== undefined && { manager_id: dto.manager_id }),
        ...(dto.budget !== undefined && { budget: dto.budget }),
        created_at: now,
        updated_at: now,
      };
      departments.push(created);
      return created;
    });

    this.logger.log(`department_created | code=${department.code} | name=${department.name}`);
    return department;
  }

  async getDepartment(ref: string): Promise<Department> {
    const departments = await this.departments.load();
    const department = departments.find((d) => d.id === ref || d.code === ref);
    if (!department) {
      throw new NotFoundException(DepartmentErrors.DEPARTMENT_NOT_FOUND);
    }
    return department;
  }

  listDepartments(): Promise<Department[]> {
    return this.departments.load();
  }

  async getDepartmentEmployees(ref: string): Promise<Employee[]> {
    const department = await this.getDepartment(ref);
    return this.listEmployees({ department: department.name });
  }

  // --- performance reviews ---

  async createPerformanceReview(
    employeeRef: string,
    dto: CreatePerformanceReviewDto,
  ): Promise<PerformanceReview> {
    const employee = await this.getEmployee(employeeRef);

    const review = await this.reviews.update((reviews) => {
      const created: PerformanceReview = {
        id: uuidv4(),
        employee_id: employee.employee_id,
        reviewer_id: dto.reviewer_id,
        review_date: dto.review_date,
        review_period: dto.review_period,
        overall_rating: dto.overall_rating,
        comments: dto.comments,
        goals: dto.goals ?? [],
        created_at: new Date().toISOString(),
      };
      reviews.push(created);
      return created;
    });

    this.logger.log(`review_created | employee_id=${review.employee_id} | rating=${review.overall_rating}`);
    return review;
  }

  async getEmployeeReviews(employeeRef: string): Promise<PerformanceReview[]> {
    const employee = await this.getEmployee(employeeRef);
    const reviews = await this.reviews.load();
    return reviews.filter((r) => r.employee_id === employee.employee_id);
  }

  // --- reporting ---

  async getOrganizationalChart(): Promise<OrganizationalChart> {
    const [departments, employees] = await Promise.all([
      this.departments.load(),
      this.employees.load(),
    ]);

    return {
      total_employees: employees.length,
      active_employees: employees.filter((e) => e.status === 'active').length,
      departments: departments.map((department) => {
        const members = employees.filter(
          (e) => e.department.toLowerCase() === department.name.toLowerCase(),
        );
        return { department, employee_count: members.length, employees: members };
      }),
    };
  }

  async getSalaryReport(): Promise<SalaryReport> {
    const active = await this.listEmployees({ status: 'active' });
    const byDepartment = new Map<string, number[]>();
    const byPosition = new Map<string, number[]>();
    let total = 0;

    for (const employee of active) {
      const salary = Number(employee.salary) || 0;
      total += salary;
      pushGroup(byDepartment, employee.department, salary);
      pushGroup(byPosition, employee.position, salary);
    }

    return {
      total_payroll: total,
      average_salary: active.length > 0 ? total / active.length : 0,
      employee_count: active.length,
      department_breakdown: breakdown(byDepartment),
      position_breakdown: breakdown(byPosition),
    };
  }

  private findEmployeeIn(employees: Employee[], ref: string): Employee {
    const employee = employees.find((e) => matchesEmployee(e, ref));
    if (!employee) {
      throw new NotFoundException(EmployeeErrors.EMPLOYEE_NOT_FOUND);
    }
    return employee;
  }
}
