/**
 * TESTES — Gate de Ações
 *
 * Testa:
 * - Bloqueio por categoria não permitida no nível atual
 * - Tradução do veredito ético em EXECUTE / REJECTED / ESCALATED
 * - Nível atual carimbado no contexto da ação
 */

import { ActionGate, ActionGateOutcome } from '../nucleo/orquestrador/ActionGate';
import { EthicalGate } from '../nucleo/etica/EthicalGate';
import { EthicalPillar, VerificationStatus } from '../nucleo/etica/EthicsTypes';
import { AutonomyFlow } from '../nucleo/autonomy/AutonomyFlow';
import { InMemoryMetricsProvider } from '../nucleo/autonomy/AutonomyPorts';
import { AutonomyLevel } from '../nucleo/autonomy/AutonomyTypes';
import { NotificationDispatcher } from '../nucleo/notificacao/NotificationDispatcher';
import { NotificationSeverity } from '../nucleo/notificacao/NotificationTypes';
import { TipoEntidade, TipoEvento } from '../nucleo/event-log/EventLogEntry';
import { silentLogger } from '../nucleo/utilitarios/Logger';
import {
  METRICAS_BOAS,
  RecordingSink,
  allocateResources,
  levelTable,
  manualClock,
  pillarTable
} from './helpers/fixtures';

function createActionGate(initialLevel: AutonomyLevel) {
  const sink = new RecordingSink();
  const clock = manualClock();
  const dispatcher = new NotificationDispatcher([sink], silentLogger());
  const ethicalGate = new EthicalGate({
    ruleTable: pillarTable(),
    logger: silentLogger(),
    dispatcher,
    clock: clock.fn
  });
  const autonomyFlow = new AutonomyFlow({
    levelTable: levelTable(),
    metricsProvider: new InMemoryMetricsProvider(METRICAS_BOAS),
    initialLevel,
    logger: silentLogger(),
    dispatcher,
    clock: clock.fn
  });
  const gate = new ActionGate({ ethicalGate, autonomyFlow, logger: silentLogger(), dispatcher, clock: clock.fn });
  return { gate, ethicalGate, sink };
}

describe('ActionGate — permissões de autonomia', () => {
  test('hotfix no nível 1 é bloqueado sem passar pela ética', () => {
    const { gate, ethicalGate, sink } = createActionGate(AutonomyLevel.ASSISTANCE);

    const result = gate.evaluate(allocateResources({ actionType: 'apply_hotfix' }));

    expect(result.outcome).toBe(ActionGateOutcome.BLOCKED_BY_AUTONOMY);
    expect(result.executar).toBe(false);
    expect(result.category).toBe('hotfix');
    expect(result.autonomyLevel).toBe(AutonomyLevel.ASSISTANCE);
    expect(result.motivo).toBe('Categoria hotfix não permitida no nível 1 (ASSISTANCE)');
    expect(result.verification).toBeUndefined();
    expect(ethicalGate.getStatistics().total).toBe(0);

    expect(sink.events).toEqual([
      {
        tipo: TipoEvento.ACAO_BLOQUEADA_AUTONOMIA,
        entidade: TipoEntidade.ACAO,
        entidadeId: result.action.id,
        timestamp: '2026-01-01T00:00:00.000Z',
        severidade: NotificationSeverity.WARNING,
        motivo: 'Categoria hotfix não permitida no nível 1 (ASSISTANCE)',
        nivelOrigem: 1,
        urgencia: 3,
        status: 'BLOCKED_BY_AUTONOMY',
        dados: { actionType: 'apply_hotfix', category: 'hotfix' }
      }
    ]);
  });

  test('hotfix no nível 2 segue para a ética e executa', () => {
    const { gate } = createActionGate(AutonomyLevel.SUPERVISED);

    const result = gate.evaluate(allocateResources({ actionType: 'apply_hotfix' }));

    expect(result.outcome).toBe(ActionGateOutcome.EXECUTE);
    expect(result.executar).toBe(true);
    expect(result.verification?.status).toBe(VerificationStatus.APPROVED);
    expect(result.motivo).toBe(result.verification?.justification);
  });

  test('tipo sem categoria não passa pela checagem de permissão', () => {
    const { gate } = createActionGate(AutonomyLevel.ASSISTANCE);

    const result = gate.evaluate(allocateResources());

    expect(result.category).toBeNull();
    expect(result.outcome).toBe(ActionGateOutcome.EXECUTE);
    expect(result.motivo).toBe('Aprovada: nenhum pilar violado, risco de consequências 0');
  });

  test('categoria explícita sobrescreve o mapa', () => {
    const { gate } = createActionGate(AutonomyLevel.HIGH);

    const result = gate.evaluate({ ...allocateResources(), category: 'evolution' });

    expect(result.outcome).toBe(ActionGateOutcome.BLOCKED_BY_AUTONOMY);
    expect(result.motivo).toBe('Categoria evolution não permitida no nível 4 (HIGH)');
  });

  test('redesenho exige nível 4', () => {
    expect(createActionGate(AutonomyLevel.CONDITIONAL).gate
      .evaluate(allocateResources({ actionType: 'redesign_system' })).outcome)
      .toBe(ActionGateOutcome.BLOCKED_BY_AUTONOMY);

    const result = createActionGate(AutonomyLevel.HIGH).gate
      .evaluate(allocateResources({ actionType: 'redesign_system' }));
    expect(result.category).toBe('redesign');
    expect(result.outcome).toBe(ActionGateOutcome.EXECUTE);
  });
});

describe('ActionGate — veredito ético', () => {
  test('nível atual substitui o informado no contexto', () => {
    const { gate } = createActionGate(AutonomyLevel.SUPERVISED);

    const result = gate.evaluate({
      ...allocateResources({ actionType: 'redesign_system', context: { autonomyLevel: 5 } }),
      category: 'hotfix'
    });

    expect(result.action.context.autonomyLevel).toBe(2);
    expect(result.outcome).toBe(ActionGateOutcome.REJECTED);
    expect(result.executar).toBe(false);
    expect(result.verification?.status).toBe(VerificationStatus.REJECTED);
  });

  test('violação de transparência é rejeitada no estágio 2', () => {
    const { gate } = createActionGate(AutonomyLevel.ASSISTANCE);

    const result = gate.evaluate(allocateResources({ parameters: { explainability: false, reversible: true } }));

    expect(result.outcome).toBe(ActionGateOutcome.REJECTED);
    expect(result.motivo).toBe('Rejeitada no estágio 2: Ação não declara explicabilidade');
    expect(result.verification?.stage).toBe(2);
    expect(result.verification?.violatedPillars).toEqual([EthicalPillar.RADICAL_TRANSPARENCY]);
  });

  test('revisão humana vira ESCALATED', () => {
    const { gate } = createActionGate(AutonomyLevel.ASSISTANCE);

    const result = gate.evaluate(allocateResources({
      urgency: 4,
      estimatedImpact: {
        directHumanImpact: 0.2,
        distributiveImpact: { giniDelta: 0.08 },
        environmentalImpact: { carbon: 800 }
      }
    }));

    expect(result.outcome).toBe(ActionGateOutcome.ESCALATED);
    expect(result.executar).toBe(false);
    expect(result.motivo).toBe(
      'Violação única com urgência 4: revisão humana requerida. ' +
      'Impacto distributivo: delta Gini 0.08 excede o máximo 0.05'
    );
  });
});
