import { ErrorCode } from './error-codes';
import { ContactBookError } from './contactbook-error';

export const ERRORS = {
  // Auth errors
  AccountExists: (username: string, e?: Error) =>
    new ContactBookError({
      code: ErrorCode.AccountExists,
      message: 'Account already exists',
      httpStatusCode: 409,
      resource: username,
      originalError: e,
    }),

  UnknownUser: () =>
    new ContactBookError({
      code: ErrorCode.UnknownUser,
      message: 'Invalid username',
      httpStatusCode: 401,
    }),

  BadPassword: () =>
    new ContactBookError({
      code: ErrorCode.BadPassword,
      message: 'Invalid password',
      httpStatusCode: 401,
    }),

  EmailUnconfirmed: () =>
    new ContactBookError({
      code: ErrorCode.EmailUnconfirmed,
      message: 'Email is not confirmed. Please, check your email',
      httpStatusCode: 401,
    }),

  // Expired, forged, missing and unknown-subject tokens all render the same
  Unauthenticated: (e?: Error) =>
    new ContactBookError({
      code: ErrorCode.Unauthenticated,
      message: 'Could not validate credentials',
      httpStatusCode: 401,
      originalError: e,
    }),

  VerificationError: (e?: Error) =>
    new ContactBookError({
      code: ErrorCode.VerificationError,
      message: 'Verification error',
      httpStatusCode: 400,
      originalError: e,
    }),

  Forbidden: (role: string) =>
    new ContactBookError({
      code: ErrorCode.Forbidden,
      message: `Access denied: ${role} role required.`,
      httpStatusCode: 403,
      metadata: { requiredRole: role },
    }),

  TokenExpired: (e?: Error) =>
    new ContactBookError({
      code: ErrorCode.TokenExpired,
      message: 'Token has expired',
      httpStatusCode: 401,
      originalError: e,
    }),

  TokenInvalid: (reason: string, e?: Error) =>
    new ContactBookError({
      code: ErrorCode.TokenInvalid,
      message: 'Invalid token',
      httpStatusCode: 401,
      originalError: e,
      metadata: { reason },
    }),

  // Contacts errors
  ContactNotFound: (contactId: number) =>
    new ContactBookError({
      code: ErrorCode.ContactNotFound,
      message: 'Contact not found.',
      httpStatusCode: 404,
      resource: String(contactId),
    }),

  // Upload errors
  InvalidFile: (message: string) =>
    new ContactBookError({
      code: ErrorCode.InvalidFile,
      message,
      httpStatusCode: 400,
    }),

  FileNotFound: (fileName: string, e?: Error) =>
    new ContactBookError({
      code: ErrorCode.FileNotFound,
      message: 'File not found',
      httpStatusCode: 404,
      resource: fileName,
      originalError: e,
    }),

  RateLimitExceeded: (limit: number, windowMs: number) =>
    new ContactBookError({
      code: ErrorCode.RateLimitExceeded,
      message: 'Rate limit exceeded. Please try again later.',
      httpStatusCode: 429,
      metadata: { limit, windowMs },
    }),
};
