export enum ErrorCode {
  // Auth errors (returned to clients)
  AccountExists = 'AccountExists',
  UnknownUser = 'UnknownUser',
  BadPassword = 'BadPassword',
  EmailUnconfirmed = 'EmailUnconfirmed',
  Unauthenticated = 'Unauthenticated',
  VerificationError = 'VerificationError',
  Forbidden = 'Forbidden',

  // Token errors (internal diagnostics only, collapsed before reaching clients)
  TokenExpired = 'TokenExpired',
  TokenInvalid = 'TokenInvalid',

  // Contacts errors
  ContactNotFound = 'ContactNotFound',

  // Upload errors
  InvalidFile = 'InvalidFile',
  FileNotFound = 'FileNotFound',

  // Request errors
  RateLimitExceeded = 'RateLimitExceeded',
}
