import { ActorId, SYSTEM_ACTOR } from '../event-log/EventLogEntry';
import { EventLogRepository } from '../event-log/EventLogRepository';
import { NotificationEvent, NotificationSink } from './NotificationTypes';

/**
 * Grava cada notificação no log de auditoria encadeado.
 */
class EventLogNotificationSink implements NotificationSink {
  readonly nome = 'event-log';

  constructor(
    private readonly eventLog: EventLogRepository,
    private readonly actor: ActorId = SYSTEM_ACTOR
  ) {}

  async notify(event: NotificationEvent): Promise<void> {
    await this.eventLog.append(this.actor, event.tipo, event.entidade, event.entidadeId, event);
  }
}

export { EventLogNotificationSink };
