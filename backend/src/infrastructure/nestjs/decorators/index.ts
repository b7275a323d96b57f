export { OwnerIdentity, requireOwner, ownerHeaderName, DEFAULT_OWNER_HEADER } from './owner-identity.decorator';
