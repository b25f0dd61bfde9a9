export const INJECTION_TOKENS = {
  CUSTOMER_REPOSITORY: Symbol('CUSTOMER_REPOSITORY'),
  APP_CONFIG: Symbol('APP_CONFIG'),
} as const;
