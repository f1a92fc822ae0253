export const CLIENT_STORE = Symbol('CLIENT_STORE');
export const ORDER_STORE = Symbol('ORDER_STORE');
export const EMPLOYEE_STORE = Symbol('EMPLOYEE_STORE');
export const DEPARTMENT_STORE = Symbol('DEPARTMENT_STORE');
export const REVIEW_STORE = Symbol('REVIEW_STORE');
