export { AuditRepository } from './audit.repository';
export { redact, mapEvent, DEFAULT_MAX_EVENTS } from './audit.model';
export type { RecordAuditInput, AuditListOptions } from './audit.schema';
