export const ClientErrors = {
  CLIENT_NOT_FOUND: {
    code: 'CLIENT_NOT_FOUND',
    message: 'Client not found.',
  },
  CLIENT_EMAIL_IN_USE: {
    code: 'CLIENT_EMAIL_IN_USE',
    message: 'A client with this email already exists.',
  },
  CLIENT_UPDATE_EMPTY: {
    code: 'CLIENT_UPDATE_EMPTY',
    message: 'Update data cannot be empty.',
  },
  CLIENT_INVALID_BALANCE: {
    code: 'CLIENT_INVALID_BALANCE',
    message: 'Balance must be a number greater than or equal to zero.',
  },
  CLIENT_INVALID_BALANCE_RANGE: {
    code: 'CLIENT_INVALID_BALANCE_RANGE',
    message: 'Maximum balance must be greater than or equal to minimum balance.',
  },
  CLIENT_SEARCH_QUERY_EMPTY: {
    code: 'CLIENT_SEARCH_QUERY_EMPTY',
    message: 'Search query cannot be empty.',
  },
};
