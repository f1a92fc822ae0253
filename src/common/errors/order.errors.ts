export const OrderErrors = {
  ORDER_NOT_FOUND: {
    code: 'ORDER_NOT_FOUND',
    message: 'Order not found.',
  },
  ORDER_MUST_HAVE_ITEMS: {
    code: 'ORDER_MUST_HAVE_ITEMS',
    message: 'An order must contain at least one item.',
  },
  ORDER_INVALID_AMOUNT: {
    code: 'ORDER_INVALID_AMOUNT',
    message: 'Total amount must be greater than zero.',
  },
  ORDER_TOTAL_MISMATCH: {
    code: 'ORDER_TOTAL_MISMATCH',
    message: 'Total amount does not match the sum of the order items.',
  },
  ORDER_INVALID_STATUS: {
    code: 'ORDER_INVALID_STATUS',
    message: 'Invalid status. Must be one of: pending, processing, shipped, delivered, cancelled.',
  },
};
