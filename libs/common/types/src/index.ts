export { Role, Account, Identity, isRole, isIdentity, toIdentity } from './auth.types';
export { Contact, ContactInput, ContactChanges, ContactFilter } from './contact.types';
