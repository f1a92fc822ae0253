import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileStore } from '../storage/json-file.store';
import { CreateEmployeeDto } from './dto/create-employee.dto';
import { Department, Employee, PerformanceReview } from './employee.entity';
import { HrService } from './hr.service';

const employeeInput = (overrides: Partial<CreateEmployeeDto> = {}): CreateEmployeeDto => ({
  employee_id: 'EMP001',
  first_name: 'Jane',
  last_name: 'Doe',
  email: 'jane@company.example',
  department: 'Engineering',
  position: 'Engineer',
  salary: 100000,
  hire_date: '2024-01-15',
  ...overrides,
});

describe('HrService', () => {
  let dir: string;
  let employees: JsonFileStore<Employee>;
  let service: HrService;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hr-'));
    employees = new JsonFileStore<Employee>(join(dir, 'employees.json'), 'employees');
    service = new HrService(
      employees,
      new JsonFileStore<Department>(join(dir, 'departments.json'), 'departments'),
      new JsonFileStore<PerformanceReview>(join(dir, 'reviews.json'), 'reviews'),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates an employee and finds it by id or employee_id', async () => {
    const created = await service.createEmployee(employeeInput());

    expect(created.status).toBe('active');
    await expect(service.getEmployee(created.id)).resolves.toEqual(created);
    await expect(service.getEmployee('EMP001')).resolves.toEqual(created);
    await expect(service.getEmployee('EMP404')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('matches employee_id without regard to case', async () => {
    const created = await service.createEmployee(employeeInput({ employee_id: 'emp-7' }));

    await expect(service.getEmployee('EMP-7')).resolves.toEqual(created);
    await expect(service.terminateEmployee('Emp-7', '2025-06-30')).resolves.toMatchObject({
      employee_id: 'emp-7',
      status: 'terminated',
    });
    await expect(
      service.createEmployee(employeeInput({ employee_id: 'EMP-7', email: 'x@company.example' })),
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('rejects a duplicate employee_id', async () => {
    await service.createEmployee(employeeInput());

    await expect(
      service.createEmployee(employeeInput({ email: 'other@company.example' })),
    ).rejects.toBeInstanceOf(ConflictException);
    await expect(service.listEmployees()).resolves.toHaveLength(1);
  });

  it('updates only the given fields and keeps identifiers', async () => {
    const created = await service.createEmployee(employeeInput());
    await employees.save([{ ...created, updated_at: '2000-01-01T00:00:00.000Z' }]);

    const updated = await service.updateEmployee('EMP001', { position: 'Senior Engineer' });

    expect(updated).toMatchObject({
      id: created.id,
      employee_id: 'EMP001',
      position: 'Senior Engineer',
      salary: 100000,
      created_at: created.created_at,
    });
    expect(updated.updated_at).not.toBe('2000-01-01T00:00:00.000Z');
    await expect(service.updateEmployee('EMP001', {})).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('terminates without deleting the record', async () => {
    await service.createEmployee(employeeInput());

    const terminated = await service.terminateEmployee('EMP001', '2025-06-30');

    expect(terminated).toMatchObject({ status: 'terminated', termination_date: '2025-06-30' });
    await expect(service.listEmployees()).resolves.toHaveLength(1);
    await expect(service.terminateEmployee('EMP001')).rejects.toBeInstanceOf(ConflictException);
  });

  it('filters and searches employees', async () => {
    await service.createEmployee(employeeInput());
    await service.createEmployee(
      employeeInput({
        employee_id: 'EMP002',
        first_name: 'Sam',
        last_name: 'Lee',
        email: 'sam@company.example',
        department: 'Sales',
        position: 'Account Executive',
      }),
    );

    const sales = await service.listEmployees({ department: 'sales' });
    expect(sales.map((e) => e.employee_id)).toEqual(['EMP002']);

    const found = await service.searchEmployees('jane doe');
    expect(found.map((e) => e.employee_id)).toEqual(['EMP001']);
    await expect(service.searchEmployees('')).rejects.toBeInstanceOf(BadRequestException);
  });

  it('manages departments by id or code', async () => {
    const dept = await service.createDepartment({ name: 'Engineering', code: 'ENG' });
    await service.createEmployee(employeeInput());

    await expect(service.getDepartment('ENG')).resolves.toEqual(dept);
    await expect(service.getDepartment(dept.id)).resolves.toEqual(dept);
    await expect(
      service.createDepartment({ name: 'Other', code: 'ENG' }),
    ).rejects.toBeInstanceOf(ConflictException);

    const members = await service.getDepartmentEmployees('ENG');
    expect(members.map((e) => e.employee_id)).toEqual(['EMP001']);
    await expect(service.getDepartmentEmployees('NOPE')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('records reviews against the employee_id', async () => {
    const created = await service.createEmployee(employeeInput());

    await service.createPerformanceReview(created.id, {
      reviewer_id: 'EMP000',
      review_date: '2025-06-30',
      review_period: '2025-H1',
      overall_rating: 4,
      comments: 'Solid half.',
    });

    const reviews = await service.getEmployeeReviews('EMP001');
    expect(reviews).toHaveLength(1);
    expect(reviews[0]).toMatchObject({ employee_id: 'EMP001', overall_rating: 4, goals: [] });
  });

  it('builds the org chart and a salary report over active employees', async () => {
    await service.createDepartment({ name: 'Engineering', code: 'ENG' });
    await service.createEmployee(employeeInput());
    await service.createEmployee(
      employeeInput({ employee_id: 'EMP002', email: 'b@company.example', salary: 50000 }),
    );
    await service.createEmployee(
      employeeInput({ employee_id: 'EMP003', email: 'c@company.example', salary: 70000 }),
    );
    await service.terminateEmployee('EMP003', '2025-01-01');

    const chart = await service.getOrganizationalChart();
    expect(chart.total_employees).toBe(3);
    expect(chart.active_employees).toBe(2);
    expect(chart.departments[0].employee_count).toBe(3);

    const report = await service.getSalaryReport();
    expect(report).toEqual({
      total_payroll: 150000,
      average_salary: 75000,
      employee_count: 2,
      department_breakdown: { Engineering: { total: 150000, average: 75000, count: 2 } },
      position_breakdown: { Engineer: { total: 150000, average: 75000, count: 2 } },
    });
  });
});
