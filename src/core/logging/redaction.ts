/**
 * Redaction configuration for pino.
 *
 * Generated secrets must never reach a log line, even when a caller
 * passes a whole result object as log context.
 */
export const REDACTION_CONFIG = {
  paths: [
    'password',
    'passwords',
    'passphrase',
    'passphrases',
    'values',
    'secret',
    'token',

    '*.password',
    '*.passwords',
    '*.passphrase',
    '*.passphrases',
    '*.values',
    '*.secret',
    '*.token',
  ],
  censor: '[REDACTED]',
};
