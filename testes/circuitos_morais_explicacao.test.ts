/**
 * TESTES — Circuitos Morais: Explicação
 *
 * explain() lê o registro do histórico; não reavalia a ação.
 */

import { EthicalGate } from '../nucleo/etica/EthicalGate';
import { EthicalPillar, VerificationStatus } from '../nucleo/etica/EthicsTypes';
import { silentLogger } from '../nucleo/utilitarios/Logger';
import { allocateResources, manualClock, pillarTable } from './helpers/fixtures';

function createGate(): EthicalGate {
  return new EthicalGate({
    ruleTable: pillarTable(),
    logger: silentLogger(),
    clock: manualClock().fn
  });
}

describe('EthicalGate.explain', () => {
  test('violação de equidade: pilar, regra e impacto por pilar', () => {
    const gate = createGate();
    const result = gate.verify(allocateResources({
      urgency: 4,
      estimatedImpact: {
        directHumanImpact: 0.2,
        distributiveImpact: { giniDelta: 0.08 },
        environmentalImpact: { carbon: 800 }
      }
    }));

    const explanation = gate.explain(result.id);

    expect(explanation).not.toBeNull();
    if (!explanation) return;

    expect(explanation.verificationId).toBe(result.id);
    expect(explanation.status).toBe(VerificationStatus.NEEDS_REVIEW);
    expect(explanation.stage).toBe(2);
    expect(explanation.action).toEqual({
      id: result.actionId,
      actionType: 'allocate_resources',
      urgency: 4,
      autonomyLevel: 1,
      justification: 'Redistribuir capacidade ociosa'
    });
    expect(explanation.violations).toEqual([{
      pillar: EthicalPillar.GLOBAL_EQUITY,
      pillarName: 'Equidade Global',
      priority: 2,
      rules: [{
        id: 'EQUIDADE_DELTA_GINI',
        description: 'A ação não pode elevar o índice de Gini em mais de 0.05',
        message: 'Impacto distributivo: delta Gini 0.08 excede o máximo 0.05'
      }]
    }]);
    expect(explanation.impactBreakdown).toEqual([
      { pillar: EthicalPillar.PRESERVE_LIFE, impact: 'BAIXO', detail: 'Impacto humano direto 0.2' },
      { pillar: EthicalPillar.GLOBAL_EQUITY, impact: 'ALTO', detail: 'Delta Gini 0.08' },
      { pillar: EthicalPillar.RADICAL_TRANSPARENCY, impact: 'NENHUM', detail: 'Explicabilidade declarada' },
      { pillar: EthicalPillar.SUSTAINABILITY, impact: 'MODERADO', detail: 'Carbono 800 t, água 0 m³' },
      { pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL, impact: 'NENHUM', detail: 'Ação reversível' }
    ]);
    expect(explanation.alternatives.map(a => a.overrides)).toEqual([{ includeCompensation: true }]);
    expect(explanation).not.toHaveProperty('riskScore');
  });

  test('escalonamento por risco explica a regra do estágio 3', () => {
    const gate = createGate();
    const result = gate.verify({
      actionType: 'redesign_system',
      context: { autonomyLevel: 4 },
      parameters: { explainability: true },
      estimatedImpact: { complexity: 4 },
      urgency: 5
    });

    const explanation = gate.explain(result.id);

    expect(explanation?.riskScore).toBe(0.9);
    expect(explanation?.action.autonomyLevel).toBe(4);
    expect(explanation?.violations).toEqual([{
      pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
      pillarName: 'Controle Humano Residual',
      priority: 5,
      rules: [{
        id: 'CONTROLE_RISCO_CONSEQUENCIAS',
        description: 'Risco de consequências acima de 0.8 exige revisão humana',
        message: 'Risco de consequências 0.9 acima de 0.8'
      }]
    }]);
    expect(explanation?.impactBreakdown[4]).toEqual({
      pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
      impact: 'MODERADO',
      detail: 'Ação estrutural (redesign_system)'
    });
  });

  test('redesenho sem autonomia aparece como impacto alto no controle humano', () => {
    const gate = createGate();
    const result = gate.verify({
      actionType: 'redesign_system',
      context: { autonomyLevel: 2 },
      parameters: { explainability: true }
    });

    const breakdown = gate.explain(result.id)?.impactBreakdown ?? [];

    expect(breakdown.find(b => b.pillar === EthicalPillar.RESIDUAL_HUMAN_CONTROL)).toEqual({
      pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
      impact: 'ALTO',
      detail: 'Redesenho no nível 2'
    });
  });

  test('ação sem explicabilidade e não reversível', () => {
    const gate = createGate();
    const result = gate.verify({ actionType: 'allocate_resources' });

    const breakdown = gate.explain(result.id)?.impactBreakdown ?? [];

    expect(breakdown.map(b => b.impact)).toEqual(['NENHUM', 'NENHUM', 'ALTO', 'NENHUM', 'BAIXO']);
    expect(breakdown[4].detail).toBe('Ação não declarada reversível');
  });

  test('explicar duas vezes devolve o mesmo conteúdo, mesmo com novas verificações', () => {
    const gate = createGate();
    const result = gate.verify(allocateResources({ parameters: { explainability: false } }));

    const primeira = gate.explain(result.id);
    gate.verify(allocateResources());
    const segunda = gate.explain(result.id);

    expect(primeira).not.toBeNull();
    expect(segunda).toEqual(primeira);
    expect(segunda).not.toBe(primeira);
  });

  test('id desconhecido retorna null', () => {
    expect(createGate().explain('verif_inexistente')).toBeNull();
  });
});
