/**
 * Command exports
 */

export {
  createCreateUserCommand,
  createListUsersCommand,
  createChangePasswordCommand,
  createChangeRoleCommand,
  createActivateCommand,
  createDeactivateCommand,
  createUnlockCommand,
  createDeleteUserCommand,
} from './users';
export { createAuditCommand } from './audit';
export { createInitKeyCommand } from './keys';
