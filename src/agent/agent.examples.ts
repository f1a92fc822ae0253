export const AGENT_EXAMPLES: Record<'crm' | 'erp' | 'hr', string[]> = {
  crm: [
    'List all clients',
    'List all clients with balance over 5000',
    'Show clients with balance between 1000 and 5000',
    'Search clients for acme',
    'Create client named Acme Corp with email ops@acme.example and balance 1000',
    'Update client balance for <client id> to 5000',
    'Show client statistics',
  ],
  erp: [
    'List all orders',
    'Show pending orders',
    'Create order for client <client id> with total amount 2500',
    'Get order ORD-20250101-001',
    'Update order ORD-20250101-001 to shipped',
  ],
  hr: [
    'List employees in the Engineering department',
    'Show employee EMP001',
    'Terminate employee EMP002 effective 2025-06-30',
    'Show the salary report',
    'Show the org chart',
  ],
};
