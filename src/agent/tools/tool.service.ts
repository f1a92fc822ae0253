import {
  BadRequestException,
  ConflictException,
  HttpException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { performance } from 'perf_hooks';
import { AgentErrors } from '../../common/errors/agent.errors';
import { PersistenceException } from '../../common/exceptions/persistence.exception';
import { CrmService } from '../../crm/crm.service';
import { CreateClientDto } from '../../crm/dto/create-client.dto';
import { CreateOrderDto } from '../../erp/dto/create-order.dto';
import { ErpService } from '../../erp/erp.service';
import { CreateEmployeeDto } from '../../hr/dto/create-employee.dto';
import { HrService } from '../../hr/hr.service';
import {
  ClientIdParams,
  FilterClientsByBalanceParams,
  SearchParams,
  UpdateClientBalanceParams,
  UpdateClientParams,
} from './dto/client-tool-params.dto';
import {
  DepartmentParams,
  EmployeeIdParams,
  ListEmployeesParams,
  TerminateEmployeeParams,
  UpdateEmployeeParams,
} from './dto/employee-tool-params.dto';
import {
  FilterOrdersByStatusParams,
  OrderIdParams,
  UpdateOrderStatusParams,
} from './dto/order-tool-params.dto';
import { ToolCall, ToolErrorKind, ToolName, ToolParameters, ToolResult } from './tool.type';

type ToolHandler = (params: ToolParameters) => Promise<unknown>;

function flattenConstraints(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {});
    return [...own, ...flattenConstraints(error.children ?? [], path)];
  });
}

function errorKindOf(error: unknown): ToolErrorKind {
  if (error instanceof PersistenceException) return 'storage';
  if (error instanceof NotFoundException) return 'not_found';
  if (error instanceof BadRequestException || error instanceof ConflictException) {
    return 'validation';
  }
  return 'execution';
}

function errorMessageOf(error: unknown): string {
  if (error instanceof HttpException) {
    const response = error.getResponse();
    if (typeof response === 'object' && response !== null && 'message' in response) {
      const { message } = response;
      if (typeof message === 'string') return message;
      if (Array.isArray(message)) return message.join('; ');
    }
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const elapsedSeconds = (startedAt: number): number => (performance.now() - startedAt) / 1000;

/**
 * Executes tool calls against the CRM, ERP and HR services. Parameters are
 * validated with the tool's DTO first; service failures are reported in the
 * result, never thrown.
 */
@Injectable()
export class ToolService {
  private readonly logger = new Logger(ToolService.name);
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(
    private readonly crm: CrmService,
    private readonly erp: ErpService,
    private readonly hr: HrService,
  ) {
    this.handlers = {
      // crm
      get_client_by_id: async (p) =>
        this.crm.getClientById((await this.parse(ClientIdParams, p)).client_id),
      create_client: async (p) => this.crm.createClient(await this.parse(CreateClientDto, p)),
      update_client: async (p) => {
        const { client_id, ...patch } = await this.parse(UpdateClientParams, p);
        return this.crm.updateClient(client_id, patch);
      },
      update_client_balance: async (p) => {
        const { client_id, new_balance } = await this.parse(UpdateClientBalanceParams, p);
        return this.crm.updateClientBalance(client_id, new_balance);
      },
      list_all_clients: () => this.crm.listAllClients(),
      filter_clients_by_balance: async (p) => {
        const { min_balance, max_balance } = await this.parse(FilterClientsByBalanceParams, p);
        return this.crm.filterClientsByBalance(min_balance, max_balance);
      },
      delete_client: async (p) =>
        this.crm.deleteClient((await this.parse(ClientIdParams, p)).client_id),
      search_clients: async (p) =>
        this.crm.searchClients((await this.parse(SearchParams, p)).query),
      get_client_statistics: () => this.crm.getClientStatistics(),

      // erp
      create_order: async (p) => this.erp.createOrder(await this.parse(CreateOrderDto, p)),
      get_order_by_id: async (p) =>
        this.erp.getOrderById((await this.parse(OrderIdParams, p)).order_id),
      update_order_status: async (p) => {
        const { order_id, new_status } = await this.parse(UpdateOrderStatusParams, p);
        return this.erp.updateOrderStatus(order_id, new_status);
      },
      list_all_orders: () => this.erp.listAllOrders(),
      filter_orders_by_status: async (p) =>
        this.erp.listOrdersByStatus((await this.parse(FilterOrdersByStatusParams, p)).status),

      // hr
      create_employee: async (p) => this.hr.createEmployee(await this.parse(CreateEmployeeDto, p)),
      get_employee: async (p) =>
        this.hr.getEmployee((await this.parse(EmployeeIdParams, p)).employee_id),
      update_employee: async (p) => {
        const { employee_id, ...patch } = await this.parse(UpdateEmployeeParams, p);
        return this.hr.updateEmployee(employee_id, patch);
      },
      terminate_employee: async (p) => {
        const { employee_id, termination_date } = await this.parse(TerminateEmployeeParams, p);
        return this.hr.terminateEmployee(employee_id, termination_date);
      },
      list_employees: async (p) => {
        const { department, status, position } = await this.parse(ListEmployeesParams, p);
        return this.hr.listEmployees({ department, status, position });
      },
      search_employees: async (p) =>
        this.hr.searchEmployees((await this.parse(SearchParams, p)).query),
      list_departments: () => this.hr.listDepartments(),
      get_department_employees: async (p) =>
        this.hr.getDepartmentEmployees((await this.parse(DepartmentParams, p)).department),
      get_organizational_chart: () => this.hr.getOrganizationalChart(),
      get_salary_report: () => this.hr.getSalaryReport(),
    };
  }

  supports(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(this.handlers, name);
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    const startedAt = performance.now();
    const toolName = call.toolName;

    if (!this.supports(toolName)) {
      this.logger.warn(`unknown_tool | tool=${toolName}`);
      return {
        success: false,
        toolName,
        errorKind: 'unknown_tool',
        errorMessage: `${AgentErrors.UNKNOWN_TOOL.message}: ${toolName}`,
        executionTime: elapsedSeconds(startedAt),
      };
    }

    try {
      const result = await this.handlers[toolName](call.parameters ?? {});
      const executionTime = elapsedSeconds(startedAt);
      this.logger.log(`tool_executed | tool=${toolName} | seconds=${executionTime.toFixed(4)}`);
      return { success: true, toolName, result, executionTime };
    } catch (error) {
      const errorKind = errorKindOf(error);
      const errorMessage = errorMessageOf(error);
      this.logger.warn(`tool_failed | tool=${toolName} | kind=${errorKind} | ${errorMessage}`);
      return {
        success: false,
        toolName,
        errorKind,
        errorMessage,
        executionTime: elapsedSeconds(startedAt),
      };
    }
  }

  private async parse<T extends object>(
    cls: ClassConstructor<T>,
    params: ToolParameters,
  ): Promise<T> {
    const instance = plainToInstance(cls, params);
    const errors = await validate(instance, { whitelist: true, forbidNonWhitelisted: true });
    if (errors.length > 0) {
      throw new BadRequestException({
        code: AgentErrors.INVALID_TOOL_PARAMETERS.code,
        message: `${AgentErrors.INVALID_TOOL_PARAMETERS.message} ${flattenConstraints(errors).join('; ')}`,
      });
    }
    return instance;
  }
}
