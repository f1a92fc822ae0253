export const EmployeeErrors = {
  EMPLOYEE_NOT_FOUND: {
    code: 'EMPLOYEE_NOT_FOUND',
    message: 'Employee not found.',
  },
  EMPLOYEE_ID_IN_USE: {
    code: 'EMPLOYEE_ID_IN_USE',
    message: 'An employee with this employee ID already exists.',
  },
  EMPLOYEE_UPDATE_EMPTY: {
    code: 'EMPLOYEE_UPDATE_EMPTY',
    message: 'Update data cannot be empty.',
  },
  EMPLOYEE_SEARCH_QUERY_EMPTY: {
    code: 'EMPLOYEE_SEARCH_QUERY_EMPTY',
    message: 'Search query cannot be empty.',
  },
  EMPLOYEE_ALREADY_TERMINATED: {
    code: 'EMPLOYEE_ALREADY_TERMINATED',
    message: 'This employee has already been terminated.',
  },
};

export const DepartmentErrors = {
  DEPARTMENT_NOT_FOUND: {
    code: 'DEPARTMENT_NOT_FOUND',
    message: 'Department not found.',
  },
  DEPARTMENT_CODE_IN_USE: {
    code: 'DEPARTMENT_CODE_IN_USE',
    message: 'A department with this code already exists.',
  },
};
