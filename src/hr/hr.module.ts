import { Module } from '@nestjs/common';
import { jsonFileStoreProvider } from '../storage/storage.providers';
import { DEPARTMENT_STORE, EMPLOYEE_STORE, REVIEW_STORE } from '../storage/storage.tokens';
import { DepartmentsController } from './departments.controller';
import { EmployeesController } from './employees.controller';
import { HrReportsController } from './hr-reports.controller';
import { HrService } from './hr.service';

@Module({
  controllers: [EmployeesController, DepartmentsController, HrReportsController],
  providers: [
    jsonFileStoreProvider(EMPLOYEE_STORE, 'employeesFile', 'employees'),
    jsonFileStoreProvider(DEPARTMENT_STORE, 'departmentsFile', 'departments'),
    jsonFileStoreProvider(REVIEW_STORE, 'reviewsFile', 'reviews'),
    HrService,
  ],
  exports: [HrService],
})
export class HrModule {}
