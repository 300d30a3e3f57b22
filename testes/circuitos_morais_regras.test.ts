/**
 * TESTES — Circuitos Morais: Regras e Avaliador em Cascata
 *
 * Testa:
 * - Defaults seguros para impacto malformado
 * - Estágio 1 (impacto humano, redesenho sem autonomia)
 * - Estágio 2 (regra assimétrica de urgência)
 * - Estágio 3 (faixas de risco)
 * - Geração de alternativas
 */

import {
  EthicalPillar,
  ProposedActionInput,
  VerificationStatus
} from '../nucleo/etica/EthicsTypes';
import { createProposedAction, normalizeImpact } from '../nucleo/etica/EthicsImpact';
import { EthicsRuleId, runStageOne, runStageTwo } from '../nucleo/etica/EthicsRules';
import { computeConsequenceRisk, classifyRisk } from '../nucleo/etica/EthicsRisk';
import { evaluateAction } from '../nucleo/etica/EthicsEvaluator';
import { pillarTable, allocateResources } from './helpers/fixtures';

const table = pillarTable();

function evaluate(input: ProposedActionInput) {
  return evaluateAction(createProposedAction(input, new Date('2026-01-01T00:00:00.000Z')), table);
}

// ════════════════════════════════════════════════════════════════════════════
// AÇÃO PROPOSTA E NORMALIZAÇÃO
// ════════════════════════════════════════════════════════════════════════════

describe('Ação proposta', () => {
  test('id combina tipo e timestamp; ação é congelada', () => {
    const now = new Date('2026-01-01T12:00:00.000Z');
    const action = createProposedAction({ actionType: 'allocate_resources' }, now);

    expect(action.id).toMatch(new RegExp(`^allocate_resources-${now.getTime()}-[0-9a-f]{6}$`));
    expect(action.createdAt).toBe('2026-01-01T12:00:00.000Z');
    expect(Object.isFrozen(action)).toBe(true);
    expect(Object.isFrozen(action.parameters)).toBe(true);
  });

  test('urgência é limitada a 1..5', () => {
    expect(createProposedAction({ actionType: 'x', urgency: 9 }).urgency).toBe(5);
    expect(createProposedAction({ actionType: 'x', urgency: 0 }).urgency).toBe(1);
    expect(createProposedAction({ actionType: 'x' }).urgency).toBe(1);
  });

  test('impacto ausente recebe defaults menos restritivos', () => {
    const impact = normalizeImpact(createProposedAction({ actionType: 'x' }));

    expect(impact).toEqual({
      directHumanImpact: 0,
      giniDelta: 0,
      carbon: 0,
      water: 0,
      reversible: false,
      testedPreviously: false,
      complexity: 1,
      urgency: 1,
      autonomyLevel: 1,
      explainability: false
    });
  });

  test('impacto malformado não lança e vira defaults', () => {
    const payload: ProposedActionInput = JSON.parse(
      '{"actionType":"allocate_resources","estimatedImpact":{"directHumanImpact":"alto",' +
      '"distributiveImpact":7,"environmentalImpact":null,"complexity":42},"urgency":9}'
    );

    const impact = normalizeImpact(createProposedAction(payload));

    expect(impact).toEqual({
      directHumanImpact: 0,
      giniDelta: 0,
      carbon: 0,
      water: 0,
      reversible: false,
      testedPreviously: false,
      complexity: 5,
      urgency: 5,
      autonomyLevel: 1,
      explainability: false
    });
  });

  test('reversible e testedPreviously caem para os parâmetros', () => {
    const impact = normalizeImpact(createProposedAction({
      actionType: 'x',
      parameters: { reversible: true, testedPreviously: true }
    }));

    expect(impact.reversible).toBe(true);
    expect(impact.testedPreviously).toBe(true);
  });

  test('infinito é limitado à faixa; NaN vira default', () => {
    const impact = normalizeImpact(createProposedAction({
      actionType: 'x',
      urgency: Infinity,
      context: { autonomyLevel: Infinity },
      estimatedImpact: {
        directHumanImpact: Infinity,
        distributiveImpact: { giniDelta: NaN },
        environmentalImpact: { carbon: Infinity, water: -Infinity },
        complexity: -Infinity
      }
    }));

    expect(impact).toMatchObject({
      directHumanImpact: 1,
      giniDelta: 0,
      carbon: Infinity,
      water: -Infinity,
      complexity: 1,
      urgency: 5,
      autonomyLevel: 5
    });
  });

  test('impacto humano infinito rejeita como valores altos finitos', () => {
    for (const dhi of [1e308, Infinity]) {
      const result = evaluate(allocateResources({ estimatedImpact: { directHumanImpact: dhi } }));

      expect(result.status).toBe(VerificationStatus.REJECTED);
      expect(result.stage).toBe(1);
      expect(result.violatedPillars).toEqual([EthicalPillar.PRESERVE_LIFE]);
    }
  });

  test('carbono infinito viola sustentabilidade', () => {
    const result = evaluate(allocateResources({
      estimatedImpact: { directHumanImpact: 0.2, environmentalImpact: { carbon: Infinity } }
    }));

    expect(result.status).toBe(VerificationStatus.REJECTED);
    expect(result.stage).toBe(2);
    expect(result.violatedPillars).toEqual([EthicalPillar.SUSTAINABILITY]);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// ESTÁGIO 1
// ════════════════════════════════════════════════════════════════════════════

describe('Estágio 1 — checagens determinísticas', () => {
  test.each([0.71, 0.8, 0.95, 1])('impacto humano %p sempre rejeita por PRESERVE_LIFE', (dhi) => {
    for (const urgency of [1, 5]) {
      for (const explainability of [true, false]) {
        const result = evaluate(allocateResources({
          urgency,
          parameters: { explainability },
          estimatedImpact: { directHumanImpact: dhi, distributiveImpact: { giniDelta: 0.2 } }
        }));

        expect(result.status).toBe(VerificationStatus.REJECTED);
        expect(result.stage).toBe(1);
        expect(result.violatedPillars).toContain(EthicalPillar.PRESERVE_LIFE);
      }
    }
  });

  test('impacto humano exatamente 0.7 não viola', () => {
    const impact = normalizeImpact(createProposedAction({
      actionType: 'x',
      estimatedImpact: { directHumanImpact: 0.7 }
    }));
    expect(runStageOne('x', impact)).toEqual([]);
  });

  test('redesenho abaixo do nível 4 rejeita com alternativa genérica', () => {
    const result = evaluate({
      actionType: 'redesign_system',
      context: { autonomyLevel: 2 },
      parameters: { explainability: true }
    });

    expect(result.status).toBe(VerificationStatus.REJECTED);
    expect(result.stage).toBe(1);
    expect(result.violatedPillars).toEqual([EthicalPillar.RESIDUAL_HUMAN_CONTROL]);
    expect(result.findings[0].ruleId).toBe(EthicsRuleId.REDESENHO_SEM_AUTONOMIA);
    expect(result.suggestedAlternatives).toHaveLength(1);
    expect(result.suggestedAlternatives[0].pillar).toBeUndefined();
    expect(result.suggestedAlternatives[0].overrides).toEqual({ reducedScope: true, scopeFactor: 0.5 });
  });

  test('as duas regras do estágio 1 são reportadas, em ordem de prioridade', () => {
    const result = evaluate({
      actionType: 'redesign_system',
      context: { autonomyLevel: 1 },
      estimatedImpact: { directHumanImpact: 0.9 }
    });

    expect(result.violatedPillars).toEqual([
      EthicalPillar.PRESERVE_LIFE,
      EthicalPillar.RESIDUAL_HUMAN_CONTROL
    ]);
    expect(result.findings.map(f => f.ruleId)).toEqual([
      EthicsRuleId.IMPACTO_HUMANO_DIRETO,
      EthicsRuleId.REDESENHO_SEM_AUTONOMIA
    ]);
    // Só PRESERVE_LIFE tem ajuste dirigido
    expect(result.suggestedAlternatives).toHaveLength(1);
    expect(result.suggestedAlternatives[0].overrides).toEqual({ safetyMargin: 2 });
  });

  test('alternativa de PRESERVE_LIFE dobra a margem existente', () => {
    const result = evaluate({
      actionType: 'allocate_resources',
      parameters: { safetyMargin: 3 },
      estimatedImpact: { directHumanImpact: 0.75 }
    });

    expect(result.suggestedAlternatives[0].overrides).toEqual({ safetyMargin: 6 });
    expect(result.suggestedAlternatives[0].action.parameters.safetyMargin).toBe(6);
  });

  test('redesenho no nível 4 passa do estágio 1', () => {
    const impact = normalizeImpact(createProposedAction({
      actionType: 'redesign_system',
      context: { autonomyLevel: 4 }
    }));
    expect(runStageOne('redesign_system', impact)).toEqual([]);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// ESTÁGIO 2
// ════════════════════════════════════════════════════════════════════════════

describe('Estágio 2 — checagens compostas', () => {
  test('cenário base: alocação de recursos é aprovada com risco 0', () => {
    const result = evaluate(allocateResources());

    expect(result.status).toBe(VerificationStatus.APPROVED);
    expect(result.stage).toBe(3);
    expect(result.riskScore).toBe(0);
    expect(result.violatedPillars).toEqual([]);
    expect(result.suggestedAlternatives).toEqual([]);
    expect(result.caution).toBeUndefined();
    expect(result.justification).toBe('Aprovada: nenhum pilar violado, risco de consequências 0');
  });

  test('sem explicabilidade e urgência 3: rejeitada por RADICAL_TRANSPARENCY', () => {
    const result = evaluate(allocateResources({ parameters: { explainability: false, reversible: true } }));

    expect(result.status).toBe(VerificationStatus.REJECTED);
    expect(result.stage).toBe(2);
    expect(result.violatedPillars).toEqual([EthicalPillar.RADICAL_TRANSPARENCY]);
    expect(result.suggestedAlternatives).toHaveLength(1);
    expect(result.suggestedAlternatives[0].pillar).toBe(EthicalPillar.RADICAL_TRANSPARENCY);
    expect(result.suggestedAlternatives[0].action.parameters).toEqual({ explainability: true, reversible: true });
  });

  test('delta Gini 0.08 com urgência 4: escalada com compensação', () => {
    const result = evaluate(allocateResources({
      urgency: 4,
      estimatedImpact: {
        directHumanImpact: 0.2,
        distributiveImpact: { giniDelta: 0.08 },
        environmentalImpact: { carbon: 800 }
      }
    }));

    expect(result.status).toBe(VerificationStatus.NEEDS_REVIEW);
    expect(result.stage).toBe(2);
    expect(result.violatedPillars).toEqual([EthicalPillar.GLOBAL_EQUITY]);
    expect(result.findings[0].message).toBe('Impacto distributivo: delta Gini 0.08 excede o máximo 0.05');
    expect(result.suggestedAlternatives.some(a => a.overrides.includeCompensation === true)).toBe(true);
  });

  test('duas violações rejeitam mesmo com urgência máxima', () => {
    const result = evaluate(allocateResources({
      urgency: 5,
      estimatedImpact: {
        distributiveImpact: { giniDelta: 0.08 },
        environmentalImpact: { carbon: 1500 }
      }
    }));

    expect(result.status).toBe(VerificationStatus.REJECTED);
    expect(result.stage).toBe(2);
    expect(result.violatedPillars).toEqual([EthicalPillar.GLOBAL_EQUITY, EthicalPillar.SUSTAINABILITY]);
    // SUSTAINABILITY não tem ajuste dirigido
    expect(result.suggestedAlternatives.map(a => a.pillar)).toEqual([EthicalPillar.GLOBAL_EQUITY]);
  });

  test('as três regras são avaliadas de forma independente', () => {
    const impact = normalizeImpact(createProposedAction({
      actionType: 'x',
      estimatedImpact: { distributiveImpact: { giniDelta: 0.1 }, environmentalImpact: { carbon: 1001 } }
    }));

    expect(runStageTwo(impact).map(f => f.ruleId)).toEqual([
      EthicsRuleId.EQUIDADE_GINI,
      EthicsRuleId.SUSTENTABILIDADE_CARBONO,
      EthicsRuleId.TRANSPARENCIA_EXPLICABILIDADE
    ]);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// ESTÁGIO 3
// ════════════════════════════════════════════════════════════════════════════

describe('Estágio 3 — risco de consequências', () => {
  function risk(actionType: string, input: Partial<ProposedActionInput>): number {
    return computeConsequenceRisk(actionType, normalizeImpact(createProposedAction({ ...input, actionType })));
  }

  test('pesos compõem o risco', () => {
    expect(risk('allocate_resources', {})).toBe(0.1);
    expect(risk('structural_change', { urgency: 4 })).toBe(0.6);
    expect(risk('redesign_system', { urgency: 5, estimatedImpact: { complexity: 4 } })).toBe(0.9);
    expect(risk('structural_change', { estimatedImpact: { complexity: 2 } })).toBe(0.5);
  });

  test('risco é limitado a [0, 1]', () => {
    expect(risk('allocate_resources', { estimatedImpact: { reversible: true, testedPreviously: true } })).toBe(0);
    expect(risk('redesign_system', { urgency: 5, estimatedImpact: { complexity: 5 } })).toBe(1);
  });

  test('faixas de decisão', () => {
    expect(classifyRisk(0.81)).toBe('REVISAO');
    expect(classifyRisk(0.8)).toBe('CAUTELA');
    expect(classifyRisk(0.51)).toBe('CAUTELA');
    expect(classifyRisk(0.5)).toBe('BAIXO');
  });

  test('risco acima de 0.8 escala para revisão humana', () => {
    const result = evaluate({
      actionType: 'redesign_system',
      context: { autonomyLevel: 4 },
      parameters: { explainability: true },
      estimatedImpact: { complexity: 4 },
      urgency: 5
    });

    expect(result.status).toBe(VerificationStatus.NEEDS_REVIEW);
    expect(result.stage).toBe(3);
    expect(result.riskScore).toBe(0.9);
    expect(result.violatedPillars).toEqual([]);
    expect(result.findings).toEqual([{
      pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
      ruleId: EthicsRuleId.RISCO_CONSEQUENCIAS,
      message: 'Risco de consequências 0.9 acima de 0.8'
    }]);
    expect(result.suggestedAlternatives[0].overrides).toEqual({ reducedScope: true, scopeFactor: 0.5 });
  });

  test('risco moderado aprova com nota de cautela', () => {
    const result = evaluate({
      actionType: 'structural_change',
      parameters: { explainability: true },
      urgency: 4
    });

    expect(result.status).toBe(VerificationStatus.APPROVED);
    expect(result.riskScore).toBe(0.6);
    expect(result.caution).toBe('Risco moderado de consequências (0.6): monitorar execução');
  });

  test('risco exatamente 0.5 aprova sem cautela', () => {
    const result = evaluate({
      actionType: 'structural_change',
      parameters: { explainability: true },
      estimatedImpact: { complexity: 2 }
    });

    expect(result.status).toBe(VerificationStatus.APPROVED);
    expect(result.riskScore).toBe(0.5);
    expect(result.caution).toBeUndefined();
  });
});
