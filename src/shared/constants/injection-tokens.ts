export const INJECTION_TOKENS = {
  APP_CONFIG: 'APP_CONFIG',
  CUSTOMER_STORE: 'CUSTOMER_STORE',
  CUSTOMER_GENERATOR: 'CUSTOMER_GENERATOR',
} as const;
