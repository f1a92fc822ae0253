export const AuthErrors = {
  API_KEY_MISSING: {
    code: 'API_KEY_MISSING',
    message: "Missing API key. Include 'Authorization: Bearer <api-key>' header.",
  },
  API_KEY_INVALID: {
    code: 'API_KEY_INVALID',
    message: 'Invalid API key.',
  },
  RATE_LIMIT_EXCEEDED: {
    code: 'RATE_LIMIT_EXCEEDED',
    message: 'Hourly request quota exceeded for this API key.',
  },
};
