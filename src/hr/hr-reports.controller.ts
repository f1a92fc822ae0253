import { Controller, Get } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { HrService } from './hr.service';

@ApiTags('HR')
@ApiBearerAuth('api-key')
@Controller('hr')
export class HrReportsController {
  constructor(private readonly hrService: HrService) {}

  @Get('org-chart')
  @ApiOperation({ summary: 'Departments with their employees' })
  organizationalChart() {
    return this.hrService.getOrganizationalChart();
  }

  @Get('salary-report')
  @ApiOperation({ summary: 'Payroll totals over active employees' })
  salaryReport() {
    return this.hrService.getSalaryReport();
  }
}
