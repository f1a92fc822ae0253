import { PatternInterpreter } from './pattern.interpreter';

describe('PatternInterpreter', () => {
  const interpreter = new PatternInterpreter();
  const pick = (text: string) => {
    const call = interpreter.interpret(text);
    return call ? { tool: call.toolName, params: call.parameters } : null;
  };

  it('maps a plain listing request', () => {
    expect(pick('List all clients')).toEqual({ tool: 'list_all_clients', params: {} });
  });

  it('maps balance thresholds to filter parameters', () => {
    expect(pick('List all clients with balance over 5000')).toEqual({
      tool: 'filter_clients_by_balance',
      params: { min_balance: 5000 },
    });
    expect(pick('Show customers with balance under $1,000')).toEqual({
      tool: 'filter_clients_by_balance',
      params: { max_balance: 1000 },
    });
    expect(pick('Show clients with balance between 1000 and 5000')).toEqual({
      tool: 'filter_clients_by_balance',
      params: { min_balance: 1000, max_balance: 5000 },
    });
  });

  it('maps a balance update with the client id and new amount', () => {
    expect(pick('Update client balance for cli001 to 5000')).toEqual({
      tool: 'update_client_balance',
      params: { client_id: 'cli001', new_balance: 5000 },
    });
  });

  it('maps an order status change', () => {
    expect(pick('Update order ORD-20250101-001 to shipped')).toEqual({
      tool: 'update_order_status',
      params: { order_id: 'ORD-20250101-001', new_status: 'shipped' },
    });
    expect(pick('Mark order ord-20250101-002 as delivered')).toEqual({
      tool: 'update_order_status',
      params: { order_id: 'ORD-20250101-002', new_status: 'delivered' },
    });
  });

  it('returns null for an unknown order status', () => {
    expect(interpreter.interpret('Update order X to teleported')).toBeNull();
  });

  it('returns null when nothing matches', async () => {
    await expect(interpreter.selectTool('What is the weather like?')).resolves.toBeNull();
    await expect(interpreter.selectTool('   ')).resolves.toBeNull();
  });

  it('builds a single-item order from the amount', () => {
    expect(pick('Create order for client cli001 with total amount 2500')).toEqual({
      tool: 'create_order',
      params: {
        client_id: 'cli001',
        items: [{ name: 'Product', quantity: 1, price: 2500 }],
        total_amount: 2500,
      },
    });
  });

  it('reads name, email and balance for a new client', () => {
    expect(
      pick('Create client named Acme Corp with email Ops@Acme.example and balance 1000'),
    ).toEqual({
      tool: 'create_client',
      params: { name: 'Acme Corp', email: 'ops@acme.example', balance: 1000 },
    });
  });

  it('falls through when a client cannot be created from the text', () => {
    expect(pick('Create a new client')).toBeNull();
  });

  it('finds clients and orders by id', () => {
    expect(pick('Show client cli001')).toEqual({
      tool: 'get_client_by_id',
      params: { client_id: 'cli001' },
    });
    expect(pick('Get details for order ORD-20250101-001')).toEqual({
      tool: 'get_order_by_id',
      params: { order_id: 'ORD-20250101-001' },
    });
  });

  it('does not read a client lookup into requests about orders', () => {
    expect(pick('Show all orders for client abc')).toEqual({ tool: 'list_all_orders', params: {} });
  });

  it('searches clients by free text', () => {
    expect(pick('Search clients for acme')).toEqual({
      tool: 'search_clients',
      params: { query: 'acme' },
    });
  });

  it('filters orders by status or lists them all', () => {
    expect(pick('Show pending orders')).toEqual({
      tool: 'filter_orders_by_status',
      params: { status: 'pending' },
    });
    expect(pick('List all orders')).toEqual({ tool: 'list_all_orders', params: {} });
  });

  it('handles employee requests', () => {
    expect(pick('List employees in the Engineering department')).toEqual({
      tool: 'list_employees',
      params: { department: 'Engineering' },
    });
    expect(pick('Show employee emp001')).toEqual({
      tool: 'get_employee',
      params: { employee_id: 'EMP001' },
    });
    expect(pick('Terminate employee EMP002 effective 2025-06-30')).toEqual({
      tool: 'terminate_employee',
      params: { employee_id: 'EMP002', termination_date: '2025-06-30' },
    });
  });

  it('explains the match in the reasoning', () => {
    expect(interpreter.interpret('List all clients')?.reasoning).toBe(
      'Pattern match: "list_all_clients" with {}',
    );
  });
});
