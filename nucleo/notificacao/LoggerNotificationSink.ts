import { Logger } from '../utilitarios/Logger';
import { NotificationEvent, NotificationSeverity, NotificationSink } from './NotificationTypes';

/**
 * Escreve cada notificação no logger, no nível da severidade.
 */
class LoggerNotificationSink implements NotificationSink {
  readonly nome = 'logger';

  constructor(private readonly logger: Logger) {}

  notify(event: NotificationEvent): void {
    const msg = event.motivo ?? event.tipo;

    switch (event.severidade) {
      case NotificationSeverity.CRITICAL:
        this.logger.error({ notificacao: event }, msg);
        break;
      case NotificationSeverity.WARNING:
        this.logger.warn({ notificacao: event }, msg);
        break;
      default:
        this.logger.info({ notificacao: event }, msg);
    }
  }
}

export { LoggerNotificationSink };
