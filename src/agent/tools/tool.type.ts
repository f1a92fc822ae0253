export const CRM_TOOL_NAMES = [
  'get_client_by_id',
  'create_client',
  'update_client',
  'update_client_balance',
  'list_all_clients',
  'filter_clients_by_balance',
  'delete_client',
  'search_clients',
  'get_client_statistics',
] as const;

export const ERP_TOOL_NAMES = [
  'create_order',
  'get_order_by_id',
  'update_order_status',
  'list_all_orders',
  'filter_orders_by_status',
] as const;

export const HR_TOOL_NAMES = [
  'create_employee',
  'get_employee',
  'update_employee',
  'terminate_employee',
  'list_employees',
  'search_employees',
  'list_departments',
  'get_department_employees',
  'get_organizational_chart',
  'get_salary_report',
] as const;

export type ToolName =
  | (typeof CRM_TOOL_NAMES)[number]
  | (typeof ERP_TOOL_NAMES)[number]
  | (typeof HR_TOOL_NAMES)[number];

export type ToolParameters = Record<string, unknown>;

export interface ToolCall {
  toolName: string;
  parameters: ToolParameters;
  reasoning: string;
}

export type ToolErrorKind = 'unknown_tool' | 'validation' | 'not_found' | 'storage' | 'execution';

export interface ToolSuccess {
  success: true;
  toolName: string;
  result: unknown;
  executionTime: number;
}

export interface ToolFailure {
  success: false;
  toolName: string;
  errorKind: ToolErrorKind;
  errorMessage: string;
  executionTime: number;
}

export type ToolResult = ToolSuccess | ToolFailure;

/** Descriptor as read from a `schemas/*.tools.json` file. */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}
