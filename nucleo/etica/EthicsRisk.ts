/**
 * CIRCUITOS MORAIS — Estágio 3: Risco de Consequências Não Intencionais
 *
 * Escalar em [0, 1] composto por pesos fixos. Função pura.
 */

import { NormalizedImpact } from './EthicsTypes';

const PESOS_RISCO = {
  BASE: 0.1,
  ACAO_ESTRUTURAL: 0.3,
  URGENCIA_ALTA: 0.2,
  POR_NIVEL_COMPLEXIDADE: 0.1,
  TESTADA_ANTES: -0.2,
  REVERSIVEL: -0.15
} as const;

const TIPOS_ESTRUTURAIS: readonly string[] = ['redesign_system', 'structural_change'];

/** Acima disto: revisão humana */
const RISCO_REVISAO = 0.8;

/** Acima disto (até RISCO_REVISAO): aprovado com cautela */
const RISCO_CAUTELA = 0.5;

type RiskBand = 'BAIXO' | 'CAUTELA' | 'REVISAO';

/**
 * Calcula o risco de consequências não intencionais.
 * Resultado limitado a [0, 1] e arredondado em 4 casas.
 */
function computeConsequenceRisk(actionType: string, impact: NormalizedImpact): number {
  let risco: number = PESOS_RISCO.BASE;

  if (TIPOS_ESTRUTURAIS.includes(actionType)) {
    risco += PESOS_RISCO.ACAO_ESTRUTURAL;
  }
  if (impact.urgency >= 4) {
    risco += PESOS_RISCO.URGENCIA_ALTA;
  }
  risco += (impact.complexity - 1) * PESOS_RISCO.POR_NIVEL_COMPLEXIDADE;
  if (impact.testedPreviously) {
    risco += PESOS_RISCO.TESTADA_ANTES;
  }
  if (impact.reversible) {
    risco += PESOS_RISCO.REVERSIVEL;
  }

  const limitado = Math.min(1, Math.max(0, risco));
  return Math.round(limitado * 10_000) / 10_000;
}

/**
 * Classifica o risco na faixa de decisão.
 */
function classifyRisk(risco: number): RiskBand {
  if (risco > RISCO_REVISAO) return 'REVISAO';
  if (risco > RISCO_CAUTELA) return 'CAUTELA';
  return 'BAIXO';
}

export {
  PESOS_RISCO,
  TIPOS_ESTRUTURAIS,
  RISCO_REVISAO,
  RISCO_CAUTELA,
  RiskBand,
  computeConsequenceRisk,
  classifyRisk
};
