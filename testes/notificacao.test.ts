/**
 * TESTES — Notificações
 *
 * Testa:
 * - Entrega a todos os sinks sem bloquear o emissor
 * - Falha de um sink não afeta os demais
 * - Sink do log de auditoria
 * - Sink do logger (nível por severidade)
 */

import pino from 'pino';
import { NotificationDispatcher } from '../nucleo/notificacao/NotificationDispatcher';
import { EventLogNotificationSink } from '../nucleo/notificacao/EventLogNotificationSink';
import { LoggerNotificationSink } from '../nucleo/notificacao/LoggerNotificationSink';
import { NotificationEvent, NotificationSeverity, NotificationSink } from '../nucleo/notificacao/NotificationTypes';
import { EventLogRepositoryImpl } from '../nucleo/event-log/EventLogRepositoryImpl';
import { SYSTEM_ACTOR, TipoEntidade, TipoEvento } from '../nucleo/event-log/EventLogEntry';
import { computePayloadHash } from '../nucleo/utilitarios/HashUtil';
import { silentLogger } from '../nucleo/utilitarios/Logger';
import { RecordingSink } from './helpers/fixtures';

function evento(overrides: Partial<NotificationEvent> = {}): NotificationEvent {
  return {
    tipo: TipoEvento.NIVEL_REVERTIDO,
    entidade: TipoEntidade.TRANSICAO,
    entidadeId: 'reversao_1',
    timestamp: '2026-01-01T00:00:00.000Z',
    severidade: NotificationSeverity.CRITICAL,
    motivo: 'Incidente crítico',
    nivelOrigem: 3,
    nivelDestino: 1,
    urgencia: 5,
    ...overrides
  };
}

const quebradoSync: NotificationSink = {
  nome: 'quebrado-sync',
  notify() {
    throw new Error('indisponível');
  }
};

const quebradoAsync: NotificationSink = {
  nome: 'quebrado-async',
  notify: async () => {
    throw new Error('timeout');
  }
};

describe('NotificationDispatcher', () => {
  test('entrega o evento a todos os sinks', () => {
    const a = new RecordingSink();
    const b = new RecordingSink();
    const dispatcher = new NotificationDispatcher([a], silentLogger());
    dispatcher.addSink(b);

    dispatcher.dispatch(evento());

    expect(a.tipos()).toEqual([TipoEvento.NIVEL_REVERTIDO]);
    expect(b.tipos()).toEqual([TipoEvento.NIVEL_REVERTIDO]);
  });

  test('falhas de sinks são contadas e não impedem os demais', async () => {
    const sink = new RecordingSink();
    const dispatcher = new NotificationDispatcher([quebradoSync, quebradoAsync, sink], silentLogger());

    expect(() => dispatcher.dispatch(evento())).not.toThrow();
    await dispatcher.flush();

    expect(sink.events).toHaveLength(1);
    expect(dispatcher.failureCount()).toBe(2);
  });

  test('flush aguarda entregas assíncronas', async () => {
    const entregues: string[] = [];
    const lento: NotificationSink = {
      nome: 'lento',
      notify: async (event) => {
        await new Promise(resolve => setTimeout(resolve, 5));
        entregues.push(event.entidadeId);
      }
    };
    const dispatcher = new NotificationDispatcher([lento], silentLogger());

    dispatcher.dispatch(evento({ entidadeId: 'a' }));
    dispatcher.dispatch(evento({ entidadeId: 'b' }));
    expect(entregues).toEqual([]);

    await dispatcher.flush();
    expect(entregues).toEqual(['a', 'b']);
  });
});

describe('EventLogNotificationSink', () => {
  test('grava o evento no log encadeado', async () => {
    const eventLog = await EventLogRepositoryImpl.create();
    const dispatcher = new NotificationDispatcher([new EventLogNotificationSink(eventLog)], silentLogger());
    const event = evento();

    dispatcher.dispatch(event);
    await dispatcher.flush();

    const [entry] = await eventLog.getAll();
    expect(entry.actor).toBe(SYSTEM_ACTOR);
    expect(entry.evento).toBe(TipoEvento.NIVEL_REVERTIDO);
    expect(entry.entidade).toBe(TipoEntidade.TRANSICAO);
    expect(entry.entidade_id).toBe('reversao_1');
    expect(entry.payload_hash).toBe(computePayloadHash(event));
  });
});

describe('LoggerNotificationSink', () => {
  interface LinhaLog {
    level: number;
    msg: string;
  }

  function capturingLogger() {
    const linhas: LinhaLog[] = [];
    const logger = pino({ level: 'info' }, {
      write(linha: string) {
        linhas.push(JSON.parse(linha));
      }
    });
    return { logger, linhas };
  }

  test('nível do log segue a severidade', () => {
    const { logger, linhas } = capturingLogger();
    const sink = new LoggerNotificationSink(logger);

    sink.notify(evento({ severidade: NotificationSeverity.CRITICAL, motivo: 'crítico' }));
    sink.notify(evento({ severidade: NotificationSeverity.WARNING, motivo: 'atenção' }));
    sink.notify(evento({ severidade: NotificationSeverity.INFO, motivo: undefined, tipo: TipoEvento.TRANSICAO_CONCLUIDA }));

    expect(linhas.map(l => [l.level, l.msg])).toEqual([
      [50, 'crítico'],
      [40, 'atenção'],
      [30, TipoEvento.TRANSICAO_CONCLUIDA]
    ]);
  });
});
