export const AgentErrors = {
  NO_TOOL_MATCHED: {
    code: 'NO_TOOL_MATCHED',
    message: 'No appropriate tool found',
  },
  UNKNOWN_TOOL: {
    code: 'UNKNOWN_TOOL',
    message: 'Unknown tool',
  },
  INVALID_TOOL_PARAMETERS: {
    code: 'INVALID_TOOL_PARAMETERS',
    message: 'Tool parameters are invalid.',
  },
};
