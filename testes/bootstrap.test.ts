/**
 * TESTES — Bootstrap do Guardião
 *
 * Montagem completa: tabelas reais, event log em arquivo, dispatcher com
 * sinks de auditoria e serviços ligados entre si.
 */

import * as path from 'path';
import { createGuardiao } from '../nucleo/bootstrap';
import { ConfigError, DEFAULT_CONFIG, GuardiaoConfig } from '../nucleo/configuracao/RuntimeConfig';
import { ActionGateOutcome } from '../nucleo/orquestrador/ActionGate';
import { AutonomyLevel } from '../nucleo/autonomy/AutonomyTypes';
import { TipoEvento } from '../nucleo/event-log/EventLogEntry';
import { silentLogger } from '../nucleo/utilitarios/Logger';
import {
  METRICAS_BOAS,
  NIVEIS_PATH,
  PILARES_PATH,
  RecordingSink,
  allocateResources,
  manualClock
} from './helpers/fixtures';
import { InMemoryMetricsProvider } from '../nucleo/autonomy/AutonomyPorts';
import { TestDataDir, createTestDataDir } from './helpers/testDataDir';

describe('createGuardiao', () => {
  let dataDir: TestDataDir;

  beforeEach(async () => {
    dataDir = await createTestDataDir('bootstrap');
  });

  afterEach(async () => {
    await dataDir.cleanup();
  });

  function config(overrides: Partial<GuardiaoConfig> = {}): GuardiaoConfig {
    return {
      ...DEFAULT_CONFIG,
      logLevel: 'silent',
      pilaresPath: PILARES_PATH,
      niveisPath: NIVEIS_PATH,
      eventLogPath: path.join(dataDir.dir, 'eventos.json'),
      ...overrides
    };
  }

  test('monta os serviços no nível inicial configurado', async () => {
    const guardiao = await createGuardiao(config({ nivelInicial: AutonomyLevel.CONDITIONAL }), {
      logger: silentLogger()
    });

    expect(guardiao.autonomyFlow.currentLevel()).toBe(AutonomyLevel.CONDITIONAL);
    expect(guardiao.levelTable.actionCategories.apply_hotfix).toBe('hotfix');
    expect(await guardiao.eventLog.count()).toBe(0);
  });

  test('vereditos e salvaguardas chegam ao log de auditoria e aos sinks extras', async () => {
    const sink = new RecordingSink();
    const clock = manualClock();
    const guardiao = await createGuardiao(config({ nivelInicial: AutonomyLevel.HIGH }), {
      metricsProvider: new InMemoryMetricsProvider(METRICAS_BOAS),
      sinks: [sink],
      logger: silentLogger(),
      clock: clock.fn
    });

    const result = guardiao.actionGate.evaluate(allocateResources());
    expect(result.outcome).toBe(ActionGateOutcome.EXECUTE);

    guardiao.safeguards.apply({ id: 'inc-1', categoria: 'ETICA', severidade: 'ALTA', descricao: 'Viés detectado' });
    expect(guardiao.autonomyFlow.currentLevel()).toBe(AutonomyLevel.ASSISTANCE);

    await guardiao.dispatcher.flush();

    const esperado = [
      TipoEvento.ACAO_APROVADA,
      TipoEvento.SALVAGUARDA_ACIONADA,
      TipoEvento.TRANSICAO_SOLICITADA,
      TipoEvento.TRANSICAO_APROVADA,
      TipoEvento.NIVEL_REVERTIDO
    ];
    expect(sink.tipos()).toEqual(esperado);

    const entries = await guardiao.eventLog.getAll();
    expect(entries.map(e => e.evento)).toEqual(esperado);
    expect(entries[1].entidade_id).toBe('inc-1');
    expect(await guardiao.eventLog.verifyChain()).toEqual({ valid: true, totalVerified: 5 });
  });

  test('log de auditoria em arquivo sobrevive a um novo boot', async () => {
    const primeiro = await createGuardiao(config(), { logger: silentLogger() });
    primeiro.actionGate.evaluate(allocateResources({ parameters: { explainability: false } }));
    await primeiro.dispatcher.flush();

    const segundo = await createGuardiao(config(), { logger: silentLogger() });

    const entries = await segundo.eventLog.getAll();
    expect(entries.map(e => e.evento)).toEqual([TipoEvento.ACAO_REJEITADA]);
    expect((await segundo.eventLog.verifyChain()).valid).toBe(true);
  });

  test('configuração inválida impede o boot', async () => {
    await expect(createGuardiao(config({ historicoCapacidade: 0 }), { logger: silentLogger() }))
      .rejects.toThrow(ConfigError);
  });

  test('tabela ausente impede o boot', async () => {
    await expect(createGuardiao(
      config({ pilaresPath: path.join(dataDir.dir, 'inexistente.yaml') }),
      { logger: silentLogger() }
    )).rejects.toThrow();
  });
});
