/**
 * NOTIFICAÇÕES — Dispatcher
 *
 * Distribui cada evento para todos os sinks sem aguardar.
 *
 * PRINCÍPIOS:
 * - dispatch() nunca lança e nunca bloqueia o emissor
 * - Falha de um sink não impede os demais
 * - Falhas são registradas no log (nível error)
 */

import { Logger, createLogger } from '../utilitarios/Logger';
import { NotificationEvent, NotificationSink } from './NotificationTypes';

class NotificationDispatcher {
  private readonly sinks: NotificationSink[];
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();
  private failures = 0;

  constructor(sinks: NotificationSink[] = [], logger?: Logger) {
    this.sinks = [...sinks];
    this.logger = logger ?? createLogger('notificacao');
  }

  addSink(sink: NotificationSink): void {
    this.sinks.push(sink);
  }

  /**
   * Envia o evento a todos os sinks. Retorna imediatamente.
   */
  dispatch(event: NotificationEvent): void {
    for (const sink of this.sinks) {
      let outcome: void | Promise<void>;
      try {
        outcome = sink.notify(event);
      } catch (error) {
        this.reportFailure(sink, event, error);
        continue;
      }

      if (outcome instanceof Promise) {
        const tracked: Promise<void> = outcome
          .catch(error => this.reportFailure(sink, event, error))
          .finally(() => this.pending.delete(tracked));
        this.pending.add(tracked);
      }
    }
  }

  /**
   * Aguarda as entregas assíncronas em andamento.
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Total de entregas que falharam desde a criação */
  failureCount(): number {
    return this.failures;
  }

  private reportFailure(sink: NotificationSink, event: NotificationEvent, error: unknown): void {
    this.failures++;
    this.logger.error(
      {
        sink: sink.nome,
        tipo: event.tipo,
        entidadeId: event.entidadeId,
        err: error instanceof Error ? error : new Error(String(error))
      },
      'Falha ao entregar notificação'
    );
  }
}

export { NotificationDispatcher };
