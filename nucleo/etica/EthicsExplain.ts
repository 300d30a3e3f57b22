/**
 * CIRCUITOS MORAIS — Explicação de Verificações
 *
 * Leitura pura de um registro do histórico. Não reavalia a ação:
 * o veredito explicado é sempre o que foi registrado.
 */

import {
  EthicalPillar,
  ExplainedViolation,
  NormalizedImpact,
  PillarImpactBreakdown,
  PillarRuleTable,
  QualitativeImpact,
  RuleFinding,
  VerificationExplanation
} from './EthicsTypes';
import { LIMIARES } from './EthicsRules';
import { TIPOS_ESTRUTURAIS } from './EthicsRisk';
import { VerificationRecord } from './VerificationHistory';

// ════════════════════════════════════════════════════════════════════════════
// ESCALA QUALITATIVA
// ════════════════════════════════════════════════════════════════════════════

/**
 * Faixas [ALTO, MODERADO] para pilares numéricos. Acima de 0 e abaixo
 * de MODERADO é BAIXO; exatamente 0 é NENHUM.
 */
const FAIXAS_IMPACTO = {
  IMPACTO_HUMANO: { ALTO: LIMIARES.IMPACTO_HUMANO_MAXIMO, MODERADO: 0.3 },
  DELTA_GINI: { ALTO: LIMIARES.GINI_DELTA_MAXIMO, MODERADO: 0.02 },
  CARBONO: { ALTO: LIMIARES.CARBONO_MAXIMO, MODERADO: 500 }
} as const;

function scale(value: number, faixas: { ALTO: number; MODERADO: number }): QualitativeImpact {
  if (value > faixas.ALTO) return 'ALTO';
  if (value > faixas.MODERADO) return 'MODERADO';
  if (value > 0) return 'BAIXO';
  return 'NENHUM';
}

function humanControlImpact(actionType: string, impact: NormalizedImpact): PillarImpactBreakdown {
  const pillar = EthicalPillar.RESIDUAL_HUMAN_CONTROL;

  if (actionType === 'redesign_system' && impact.autonomyLevel < LIMIARES.NIVEL_MINIMO_REDESENHO) {
    return { pillar, impact: 'ALTO', detail: `Redesenho no nível ${impact.autonomyLevel}` };
  }
  if (TIPOS_ESTRUTURAIS.includes(actionType)) {
    return { pillar, impact: 'MODERADO', detail: `Ação estrutural (${actionType})` };
  }
  if (!impact.reversible) {
    return { pillar, impact: 'BAIXO', detail: 'Ação não declarada reversível' };
  }
  return { pillar, impact: 'NENHUM', detail: 'Ação reversível' };
}

/**
 * Impacto qualitativo por pilar, na ordem de prioridade da tabela.
 */
function buildImpactBreakdown(
  actionType: string,
  impact: NormalizedImpact,
  table: PillarRuleTable
): PillarImpactBreakdown[] {
  return table.ordered.map(({ pillar }): PillarImpactBreakdown => {
    switch (pillar) {
      case EthicalPillar.PRESERVE_LIFE:
        return {
          pillar,
          impact: scale(impact.directHumanImpact, FAIXAS_IMPACTO.IMPACTO_HUMANO),
          detail: `Impacto humano direto ${impact.directHumanImpact}`
        };
      case EthicalPillar.GLOBAL_EQUITY:
        return {
          pillar,
          impact: scale(impact.giniDelta, FAIXAS_IMPACTO.DELTA_GINI),
          detail: `Delta Gini ${impact.giniDelta}`
        };
      case EthicalPillar.SUSTAINABILITY:
        return {
          pillar,
          impact: scale(impact.carbon, FAIXAS_IMPACTO.CARBONO),
          detail: `Carbono ${impact.carbon} t, água ${impact.water} m³`
        };
      case EthicalPillar.RADICAL_TRANSPARENCY:
        return impact.explainability
          ? { pillar, impact: 'NENHUM', detail: 'Explicabilidade declarada' }
          : { pillar, impact: 'ALTO', detail: 'Explicabilidade ausente' };
      case EthicalPillar.RESIDUAL_HUMAN_CONTROL:
        return humanControlImpact(actionType, impact);
    }
  });
}

// ════════════════════════════════════════════════════════════════════════════
// VIOLAÇÕES
// ════════════════════════════════════════════════════════════════════════════

/**
 * Achados agrupados por pilar, em ordem de prioridade, com a descrição
 * de cada regra vinda da tabela.
 */
function groupFindings(findings: readonly RuleFinding[], table: PillarRuleTable): ExplainedViolation[] {
  const groups: ExplainedViolation[] = [];

  for (const def of table.ordered) {
    const own = findings.filter(f => f.pillar === def.pillar);
    if (own.length === 0) continue;

    groups.push({
      pillar: def.pillar,
      pillarName: def.name,
      priority: def.priority,
      rules: own.map(f => ({
        id: f.ruleId,
        description: def.rules.find(r => r.id === f.ruleId)?.description ?? '',
        message: f.message
      }))
    });
  }

  return groups;
}

/**
 * Monta a explicação de um registro do histórico.
 */
function buildExplanation(record: VerificationRecord, table: PillarRuleTable): VerificationExplanation {
  const { result, action, impact } = record;

  const explanation: VerificationExplanation = {
    verificationId: result.id,
    status: result.status,
    stage: result.stage,
    justification: result.justification,
    action: {
      id: action.id,
      actionType: action.actionType,
      urgency: action.urgency,
      autonomyLevel: impact.autonomyLevel,
      justification: action.justification
    },
    violations: groupFindings(result.findings, table),
    impactBreakdown: buildImpactBreakdown(action.actionType, impact, table),
    alternatives: result.suggestedAlternatives.map(a => ({ ...a, overrides: { ...a.overrides } })),
    timestamp: result.timestamp
  };

  if (result.riskScore !== undefined) {
    explanation.riskScore = result.riskScore;
  }

  return explanation;
}

export { buildExplanation, buildImpactBreakdown, groupFindings, FAIXAS_IMPACTO };
