/**
 * CIRCUITOS MORAIS — Avaliador em Cascata
 *
 * ORDEM DE VERIFICAÇÃO:
 * 1. Estágio 1: checagens determinísticas (APPROVED ou REJECTED, nunca escala)
 * 2. Estágio 2: equidade, sustentabilidade, transparência
 *    - nenhuma violação → estágio 3
 *    - exatamente uma violação e urgência >= 4 → NEEDS_REVIEW
 *    - qualquer outro conjunto não vazio → REJECTED
 * 3. Estágio 3: risco de consequências (só roda se o estágio 2 aprovou)
 *
 * A regra do estágio 2 é assimétrica: urgência alta só escala violação única.
 * Múltiplas violações rejeitam mesmo que individualmente leves.
 *
 * PRINCÍPIOS:
 * - Função pura sobre a ação e a tabela estática
 * - Determinística
 * - Nunca lança: impacto malformado recebe defaults
 */

import {
  EthicalPillar,
  EvaluationOutcome,
  PillarRuleTable,
  ProposedAction,
  RuleFinding,
  VerificationStatus
} from './EthicsTypes';
import { normalizeImpact } from './EthicsImpact';
import { runStageOne, runStageTwo, LIMIARES, EthicsRuleId } from './EthicsRules';
import { computeConsequenceRisk, classifyRisk } from './EthicsRisk';
import { generateAlternatives } from './EthicsAlternatives';

/**
 * Pilares violados, sem repetição, em ordem de prioridade da tabela.
 */
function orderPillars(findings: readonly RuleFinding[], table: PillarRuleTable): EthicalPillar[] {
  const violated = new Set(findings.map(f => f.pillar));
  return table.ordered.map(def => def.pillar).filter(p => violated.has(p));
}

function describeFindings(findings: readonly RuleFinding[]): string {
  return findings.map(f => f.message).join('; ');
}

/**
 * Avalia uma ação proposta.
 *
 * @param action - Ação proposta
 * @param table - Tabela de pilares validada
 * @returns Veredito sem id/timestamp
 */
function evaluateAction(action: ProposedAction, table: PillarRuleTable): EvaluationOutcome {
  const impact = normalizeImpact(action);

  // ══════════════════════════════════════════════════════════════════════════
  // ESTÁGIO 1
  // ══════════════════════════════════════════════════════════════════════════
  const stageOne = runStageOne(action.actionType, impact);
  if (stageOne.length > 0) {
    const violatedPillars = orderPillars(stageOne, table);
    return {
      status: VerificationStatus.REJECTED,
      stage: 1,
      justification: `Rejeitada no estágio 1: ${describeFindings(stageOne)}`,
      violatedPillars,
      findings: stageOne,
      suggestedAlternatives: generateAlternatives(action, violatedPillars)
    };
  }

  // ══════════════════════════════════════════════════════════════════════════
  // ESTÁGIO 2
  // ══════════════════════════════════════════════════════════════════════════
  const stageTwo = runStageTwo(impact);
  if (stageTwo.length > 0) {
    const violatedPillars = orderPillars(stageTwo, table);
    const escalate = stageTwo.length === 1 && impact.urgency >= LIMIARES.URGENCIA_ESCALONAMENTO;

    return {
      status: escalate ? VerificationStatus.NEEDS_REVIEW : VerificationStatus.REJECTED,
      stage: 2,
      justification: escalate
        ? `Violação única com urgência ${impact.urgency}: revisão humana requerida. ${describeFindings(stageTwo)}`
        : `Rejeitada no estágio 2: ${describeFindings(stageTwo)}`,
      violatedPillars,
      findings: stageTwo,
      suggestedAlternatives: generateAlternatives(action, violatedPillars)
    };
  }

  // ══════════════════════════════════════════════════════════════════════════
  // ESTÁGIO 3
  // ══════════════════════════════════════════════════════════════════════════
  const riskScore = computeConsequenceRisk(action.actionType, impact);
  const band = classifyRisk(riskScore);

  if (band === 'REVISAO') {
    return {
      status: VerificationStatus.NEEDS_REVIEW,
      stage: 3,
      justification: `Risco de consequências não intencionais ${riskScore} exige revisão humana`,
      violatedPillars: [],
      findings: [{
        pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
        ruleId: EthicsRuleId.RISCO_CONSEQUENCIAS,
        message: `Risco de consequências ${riskScore} acima de 0.8`
      }],
      suggestedAlternatives: generateAlternatives(action, []),
      riskScore
    };
  }

  if (band === 'CAUTELA') {
    const caution = `Risco moderado de consequências (${riskScore}): monitorar execução`;
    return {
      status: VerificationStatus.APPROVED,
      stage: 3,
      justification: `Aprovada com cautela. ${caution}`,
      violatedPillars: [],
      findings: [],
      suggestedAlternatives: [],
      riskScore,
      caution
    };
  }

  return {
    status: VerificationStatus.APPROVED,
    stage: 3,
    justification: `Aprovada: nenhum pilar violado, risco de consequências ${riskScore}`,
    violatedPillars: [],
    findings: [],
    suggestedAlternatives: [],
    riskScore
  };
}

export { evaluateAction, orderPillars };
