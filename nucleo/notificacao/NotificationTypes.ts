/**
 * NOTIFICAÇÕES — Tipos
 *
 * Evento de auditoria emitido pelo gate ético e pelo fluxo de autonomia.
 * Fire-and-forget: nenhum sink devolve resposta ao emissor.
 */

import { TipoEvento, TipoEntidade } from '../event-log/EventLogEntry';

// ════════════════════════════════════════════════════════════════════════════
// SEVERIDADE
// ════════════════════════════════════════════════════════════════════════════

enum NotificationSeverity {
  INFO = 'INFO',
  WARNING = 'WARNING',
  CRITICAL = 'CRITICAL'
}

// ════════════════════════════════════════════════════════════════════════════
// EVENTO
// ════════════════════════════════════════════════════════════════════════════

interface NotificationEvent {
  tipo: TipoEvento;
  entidade: TipoEntidade;
  entidadeId: string;

  /** ISO string */
  timestamp: string;

  severidade: NotificationSeverity;

  /** Motivo ou justificativa legível */
  motivo?: string;

  /** Transições de nível */
  nivelOrigem?: number;
  nivelDestino?: number;

  urgencia?: number;

  /** Status do veredito ou estado da transição */
  status?: string;

  dados?: Record<string, unknown>;
}

/**
 * Destino de notificações. Pode ser síncrono ou assíncrono;
 * falhas são absorvidas pelo dispatcher.
 */
interface NotificationSink {
  readonly nome: string;
  notify(event: NotificationEvent): void | Promise<void>;
}

export { NotificationSeverity, NotificationEvent, NotificationSink };
