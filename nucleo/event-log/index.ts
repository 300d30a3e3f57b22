/**
 * LOG DE AUDITORIA
 *
 * Barrel export do log encadeado por hash.
 */

export {
  ActorId,
  SYSTEM_ACTOR,
  EventLogEntry,
  TipoEvento,
  TipoEntidade,
  ChainVerificationResult
} from './EventLogEntry';

export { EventLogRepository } from './EventLogRepository';
export { EventLogRepositoryImpl, verifyEntries } from './EventLogRepositoryImpl';
