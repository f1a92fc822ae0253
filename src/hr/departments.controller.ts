import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateDepartmentDto } from './dto/create-department.dto';
import { Department, Employee } from './employee.entity';
import { HrService } from './hr.service';

@ApiTags('HR')
@ApiBearerAuth('api-key')
@Controller('departments')
export class DepartmentsController {
  constructor(private readonly hrService: HrService) {}

  @Post()
  @ApiOperation({ summary: 'Create a department' })
  @ApiOkResponse({ type: Department })
  create(@Body() dto: CreateDepartmentDto) {
    return this.hrService.createDepartment(dto);
  }

  @Get()
  @ApiOkResponse({ type: [Department] })
  findAll() {
    return this.hrService.listDepartments();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a department by id or code' })
  @ApiOkResponse({ type: Department })
  findOne(@Param('id') id: string) {
    return this.hrService.getDepartment(id);
  }

  @Get(':id/employees')
  @ApiOkResponse({ type: [Employee] })
  employees(@Param('id') id: string) {
    return this.hrService.getDepartmentEmployees(id);
  }
}
