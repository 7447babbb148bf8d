/**
 * Redaction configuration for pino.
 *
 * Admitted routers are logged with their protocol parameters, which an
 * external protocol plugin may use for credentials.
 */
export const REDACTION_CONFIG = {
  paths: [
    'params.token',
    'params.secret',
    'params.password',
    'params.apiKey',
    'params.authorization',
  ],
  censor: '[REDACTED]',
};
