// ════════════════════════════════════════════════════════════════════════
// LOG DE AUDITORIA: INTERFACE DO REPOSITÓRIO
// ════════════════════════════════════════════════════════════════════════

import { ActorId, EventLogEntry, ChainVerificationResult } from './EventLogEntry';

/**
 * Repositório append-only de eventos encadeados por hash.
 */
interface EventLogRepository {
  /**
   * Registra um evento. O payload entra apenas como hash.
   */
  append(
    actor: ActorId,
    evento: string,
    entidade: string,
    entidadeId: string,
    payload: unknown
  ): Promise<EventLogEntry>;

  getAll(): Promise<EventLogEntry[]>;

  getById(id: string): Promise<EventLogEntry | null>;

  getByEvento(evento: string): Promise<EventLogEntry[]>;

  getByEntidade(entidade: string, entidadeId?: string): Promise<EventLogEntry[]>;

  count(): Promise<number>;

  /**
   * Verifica a integridade da cadeia desde o genesis.
   */
  verifyChain(): Promise<ChainVerificationResult>;
}

export { EventLogRepository };
