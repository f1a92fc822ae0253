import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateEmployeeDto } from './dto/create-employee.dto';
import { CreatePerformanceReviewDto } from './dto/create-performance-review.dto';
import { ListEmployeesQueryDto } from './dto/list-employees.dto';
import { TerminateEmployeeDto } from './dto/terminate-employee.dto';
import { UpdateEmployeeDto } from './dto/update-employee.dto';
import { Employee, PerformanceReview } from './employee.entity';
import { HrService } from './hr.service';

@ApiTags('HR')
@ApiBearerAuth('api-key')
@Controller('employees')
export class EmployeesController {
  constructor(private readonly hrService: HrService) {}

  @Post()
  @ApiOperation({ summary: 'Create an employee' })
  @ApiOkResponse({ type: Employee })
  create(@Body() dto: CreateEmployeeDto) {
    return this.hrService.createEmployee(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List employees by department, status or position, or search them' })
  @ApiOkResponse({ type: [Employee] })
  findAll(@Query() query: ListEmployeesQueryDto) {
    const { q, ...filters } = query;
    if (q !== undefined) {
      return this.hrService.searchEmployees(q);
    }
    return this.hrService.listEmployees(filters);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an employee by id or employee_id' })
  @ApiOkResponse({ type: Employee })
  findOne(@Param('id') id: string) {
    return this.hrService.getEmployee(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update an employee' })
  @ApiOkResponse({ type: Employee })
  update(@Param('id') id: string, @Body() dto: UpdateEmployeeDto) {
    return this.hrService.updateEmployee(id, dto);
  }

  @Post(':id/terminate')
  @ApiOperation({ summary: 'Terminate an employee (the record is kept)' })
  @ApiOkResponse({ type: Employee })
  terminate(@Param('id') id: string, @Body() dto: TerminateEmployeeDto) {
    return this.hrService.terminateEmployee(id, dto.termination_date);
  }

  @Get(':id/reviews')
  @ApiOperation({ summary: 'Performance reviews of an employee' })
  @ApiOkResponse({ type: [PerformanceReview] })
  reviews(@Param('id') id: string) {
    return this.hrService.getEmployeeReviews(id);
  }

  @Post(':id/reviews')
  @ApiOperation({ summary: 'Record a performance review' })
  @ApiOkResponse({ type: PerformanceReview })
  createReview(@Param('id') id: string, @Body() dto: CreatePerformanceReviewDto) {
    return this.hrService.createPerformanceReview(id, dto);
  }
}
