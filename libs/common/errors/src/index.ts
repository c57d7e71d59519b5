export { ErrorCode } from './error-codes';
export { ContactBookError, ContactBookErrorOptions, ContactBookErrorBody } from './contactbook-error';
export { ERRORS } from './errors-factory';
export { ContactBookErrorFilter } from './contactbook-error.filter';
