import { Injectable, Logger } from '@nestjs/common';
import { isOrderStatus } from '../../erp/order.entity';
import { ToolCall, ToolName, ToolParameters } from '../tools/tool.type';
import { RequestInterpreter } from './request-interpreter';

interface Intent {
  tool: ToolName;
  /** Keyword gate; extraction only runs when this passes. */
  when: (lower: string) => boolean;
  /** Required fields or null when any of them cannot be read from the text. */
  extract: (text: string) => ToolParameters | null;
}

const words = (...list: string[]) => new RegExp(`\\b(?:${list.join('|')})\\b`, 'i');

const CLIENT = words('client', 'clients', 'customer', 'customers');
const CLIENTS = words('clients', 'customers');
const ORDER = words('order');
const ORDERS = words('orders');
const EMPLOYEE = words('employee');
const EMPLOYEES = words('employees', 'staff', 'workforce');
const LIST_VERBS = words('list', 'show', 'display', 'view', 'get', 'all');
const GET_VERBS = words('get', 'show', 'find', 'fetch', 'retrieve', 'view', 'display', 'lookup', 'look up');
const SEARCH_VERBS = words('search', 'find', 'look up', 'lookup');

const NUMBER = String.raw`\$?(\d[\d,]*(?:\.\d+)?)`;
const UUID = /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/i;
const ORDER_ID = /\bORD-\d{8}-\d{3}\b/i;
const EMPLOYEE_CODE = /\bEMP[-_]?\d+\b/i;
const EMAIL = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const ISO_DATE = /\b(?:on|effective|as of)\s+(\d{4}-\d{2}-\d{2})\b/i;

// words that sit between an entity noun and its identifier
const FILLER = ['id', 'number', 'information', 'info', 'details', 'record', 'account', 'balance', 'for', 'of', 'the'];
// words that can never be an identifier
const NOT_AN_ID = [
  ...FILLER,
  'named', 'called', 'with', 'to', 'and', 'as', 'by', 'in', 'status',
  'statistics', 'stats', 'list', 'records', 'is',
];

function identifierAfter(nouns: string[], text: string): string | undefined {
  const pattern = new RegExp(
    String.raw`\b(?:${nouns.join('|')})(?:\s+(?:${FILLER.join('|')}))*\s+#?(?!(?:${NOT_AN_ID.join('|')})\b)([a-z0-9][a-z0-9_-]*)`,
    'i',
  );
  return text.match(pattern)?.[1];
}

function toNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw.replace(/,/g, ''));
  return Number.isFinite(value) ? value : undefined;
}

/** First number following `lead`, a regex fragment such as `to|as`. */
function numberAfter(lead: string, text: string): number | undefined {
  return toNumber(text.match(new RegExp(String.raw`\b(?:${lead})\s+${NUMBER}`, 'i'))?.[1]);
}

function clientId(text: string): string | undefined {
  return text.match(UUID)?.[0] ?? identifierAfter(['client', 'customer'], text);
}

function orderId(text: string): string | undefined {
  const formatted = text.match(ORDER_ID)?.[0];
  return formatted ? formatted.toUpperCase() : identifierAfter(['order'], text);
}

function employeeId(text: string): string | undefined {
  const code = text.match(EMPLOYEE_CODE)?.[0];
  return code ? code.toUpperCase() : identifierAfter(['employee'], text);
}

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, '').trim();
}

function balanceBounds(text: string): ToolParameters | null {
  const between = text.match(new RegExp(String.raw`\bbetween\s+${NUMBER}\s+and\s+${NUMBER}`, 'i'));
  if (between) {
    const min = toNumber(between[1]);
    const max = toNumber(between[2]);
    return min !== undefined && max !== undefined ? { min_balance: min, max_balance: max } : null;
  }

  const min = numberAfter('over|above|greater than|more than|at least|exceeding', text);
  const max = numberAfter('under|below|less than|at most', text);
  if (min === undefined && max === undefined) {
    return null;
  }
  return {
    ...(min !== undefined && { min_balance: min }),
    ...(max !== undefined && { max_balance: max }),
  };
}

function searchQuery(text: string): string | undefined {
  const match = text.match(/\b(?:for|matching|named|called|containing)\s+(.+?)\s*[?.!]*$/i);
  return match ? unquote(match[1]) || undefined : undefined;
}

function newClient(text: string): ToolParameters | null {
  const name = text.match(
    /\b(?:named|called|name is|name:)\s+(.+?)(?=\s+with\b|\s+and\b|\s+email\b|\s*,|\s+[\w.+-]+@|$)/i,
  )?.[1];
  const email = text.match(EMAIL)?.[0];
  if (!name || !email) {
    return null;
  }

  const balance = numberAfter(String.raw`balance(?:\s+of)?`, text);
  const phone = text.match(/\bphone(?:\s+number)?(?:\s+of)?\s+(\+?[\d][\d\s().-]{5,}\d)/i)?.[1];
  const company = text.match(/\bcompany\s+(?:name\s+)?(.+?)(?=\s+with\b|\s+and\b|\s*,|$)/i)?.[1];

  return {
    name: unquote(name),
    email: email.toLowerCase(),
    ...(balance !== undefined && { balance }),
    ...(phone !== undefined && { phone: phone.trim() }),
    ...(company !== undefined && { company: unquote(company) }),
  };
}

function newOrder(text: string): ToolParameters | null {
  const client = clientId(text);
  const amount = numberAfter(String.raw`(?:amount|total|cost|price|worth)(?:\s+of)?`, text);
  if (!client || amount === undefined || amount <= 0) {
    return null;
  }

  const priority =
    text.match(/\b(low|medium|high)\s+priority\b/i)?.[1] ??
    text.match(/\bpriority\s+(?:of\s+)?(low|medium|high)\b/i)?.[1];
  const description = text.match(
    /\b(?:description|described as)\s+(.+?)(?=\s+with\b|\s+and\b|\s*,|$)/i,
  )?.[1];
  const itemName = description ? unquote(description) : 'Product';

  return {
    client_id: client,
    items: [{ name: itemName, quantity: 1, price: amount }],
    total_amount: amount,
    ...(priority !== undefined && { priority: priority.toLowerCase() }),
    ...(description !== undefined && { description: itemName }),
  };
}

function statusChange(text: string): ToolParameters | null {
  const id = orderId(text);
  if (!id) {
    return null;
  }
  for (const match of text.matchAll(/\b(?:to|as|status(?:\s+to)?)\s+([a-z]+)/gi)) {
    const status = match[1].toLowerCase();
    if (isOrderStatus(status)) {
      return { order_id: id, new_status: status };
    }
  }
  return null;
}

function mentionedOrderStatus(text: string): string | undefined {
  return text.match(/\b(pending|processing|shipped|delivered|cancelled|canceled)\b/i)?.[1]
    .toLowerCase()
    .replace('canceled', 'cancelled');
}

function employeeFilters(text: string): ToolParameters {
  const department =
    text.match(/\bin\s+(?:the\s+)?([a-z][\w&-]*(?:\s+[a-z][\w&-]*)?)\s+department\b/i)?.[1] ??
    text.match(/\bdepartment\s+(?:of\s+|is\s+)?([a-z][\w&-]*)/i)?.[1];
  const status = text.match(/\b(active|inactive|terminated)\s+(?:employees|staff)\b/i)?.[1];
  return {
    ...(department !== undefined && { department }),
    ...(status !== undefined && { status: status.toLowerCase() }),
  };
}

const INTENTS: Intent[] = [
  {
    tool: 'filter_clients_by_balance',
    when: (t) => /\bbalance/.test(t) && !words('update', 'set', 'change', 'adjust').test(t),
    extract: balanceBounds,
  },
  {
    tool: 'get_client_statistics',
    when: (t) => CLIENT.test(t) && words('statistics', 'stats', 'metrics').test(t),
    extract: () => ({}),
  },
  {
    tool: 'search_clients',
    when: (t) => SEARCH_VERBS.test(t) && CLIENT.test(t),
    extract: (text) => {
      const query = searchQuery(text);
      return query ? { query } : null;
    },
  },
  {
    tool: 'list_all_clients',
    when: (t) => LIST_VERBS.test(t) && CLIENTS.test(t),
    extract: () => ({}),
  },
  {
    tool: 'create_client',
    when: (t) => words('create', 'add', 'new', 'register').test(t) && CLIENT.test(t),
    extract: newClient,
  },
  {
    tool: 'get_client_by_id',
    when: (t) => GET_VERBS.test(t) && CLIENT.test(t) && !ORDER.test(t) && !ORDERS.test(t),
    extract: (text) => {
      const id = clientId(text);
      return id ? { client_id: id } : null;
    },
  },
  {
    tool: 'update_client_balance',
    when: (t) => words('update', 'set', 'change', 'adjust').test(t) && /\bbalance\b/.test(t),
    extract: (text) => {
      const id = clientId(text);
      const balance = numberAfter('to|as', text);
      return id && balance !== undefined ? { client_id: id, new_balance: balance } : null;
    },
  },
  {
    tool: 'delete_client',
    when: (t) => words('delete', 'remove').test(t) && CLIENT.test(t),
    extract: (text) => {
      const id = clientId(text);
      return id ? { client_id: id } : null;
    },
  },
  {
    tool: 'filter_orders_by_status',
    when: (t) => LIST_VERBS.test(t) && ORDERS.test(t),
    extract: (text) => {
      const status = mentionedOrderStatus(text);
      return status ? { status } : null;
    },
  },
  {
    tool: 'list_all_orders',
    when: (t) => LIST_VERBS.test(t) && ORDERS.test(t),
    extract: () => ({}),
  },
  {
    tool: 'create_order',
    when: (t) => words('create', 'place', 'new', 'add', 'make').test(t) && ORDER.test(t),
    extract: newOrder,
  },
  {
    tool: 'get_order_by_id',
    when: (t) => GET_VERBS.test(t) && ORDER.test(t),
    extract: (text) => {
      const id = orderId(text);
      return id ? { order_id: id } : null;
    },
  },
  {
    tool: 'update_order_status',
    when: (t) => words('update', 'set', 'mark', 'change').test(t) && ORDER.test(t),
    extract: statusChange,
  },
  {
    tool: 'get_salary_report',
    when: (t) => words('salary report', 'payroll', 'salaries').test(t),
    extract: () => ({}),
  },
  {
    tool: 'get_organizational_chart',
    when: (t) => words('org chart', 'organizational chart', 'organization chart').test(t),
    extract: () => ({}),
  },
  {
    tool: 'list_departments',
    when: (t) => LIST_VERBS.test(t) && words('departments').test(t),
    extract: () => ({}),
  },
  {
    tool: 'list_employees',
    when: (t) => LIST_VERBS.test(t) && EMPLOYEES.test(t),
    extract: employeeFilters,
  },
  {
    tool: 'get_employee',
    when: (t) => GET_VERBS.test(t) && EMPLOYEE.test(t),
    extract: (text) => {
      const id = employeeId(text);
      return id ? { employee_id: id } : null;
    },
  },
  {
    tool: 'terminate_employee',
    when: (t) => words('terminate', 'fire', 'offboard', 'dismiss').test(t) && EMPLOYEE.test(t),
    extract: (text) => {
      const id = employeeId(text);
      if (!id) return null;
      const date = text.match(ISO_DATE)?.[1];
      return { employee_id: id, ...(date !== undefined && { termination_date: date }) };
    },
  },
];

/**
 * Keyword and regex based interpreter. Intents are tried in order; the first
 * one whose required fields can all be extracted wins.
 */
@Injectable()
export class PatternInterpreter extends RequestInterpreter {
  readonly kind = 'pattern';
  private readonly logger = new Logger(PatternInterpreter.name);

  async selectTool(text: string): Promise<ToolCall | null> {
    return this.interpret(text);
  }

  interpret(text: string): ToolCall | null {
    const trimmed = (text ?? '').trim();
    if (!trimmed) {
      return null;
    }
    const lower = trimmed.toLowerCase();

    for (const intent of INTENTS) {
      if (!intent.when(lower)) continue;
      const parameters = intent.extract(trimmed);
      if (parameters) {
        return {
          toolName: intent.tool,
          parameters,
          reasoning: `Pattern match: "${intent.tool}" with ${JSON.stringify(parameters)}`,
        };
      }
    }

    this.logger.debug(`no_intent_matched | text=${trimmed.slice(0, 120)}`);
    return null;
  }
}
