/**
 * CIRCUITOS MORAIS — Regras dos Estágios 1 e 2
 *
 * Cada regra é uma função pura que recebe o impacto normalizado e retorna
 * um achado (violação) ou null.
 *
 * PRINCÍPIOS:
 * - NÃO altera dados
 * - NÃO lança exceções
 * - Limiares fixos, declarados em LIMIARES
 */

import { EthicalPillar, NormalizedImpact, RuleFinding } from './EthicsTypes';

// ════════════════════════════════════════════════════════════════════════════
// LIMIARES
// ════════════════════════════════════════════════════════════════════════════

const LIMIARES = {
  /** Estágio 1: impacto humano direto acima disto rejeita */
  IMPACTO_HUMANO_MAXIMO: 0.7,
  /** Estágio 1: redesenho de sistema exige nível >= 4 */
  NIVEL_MINIMO_REDESENHO: 4,
  /** Estágio 2: variação de Gini acima disto viola equidade */
  GINI_DELTA_MAXIMO: 0.05,
  /** Estágio 2: toneladas de carbono acima disto violam sustentabilidade */
  CARBONO_MAXIMO: 1000,
  /** Estágio 2: urgência a partir da qual uma violação única é escalada */
  URGENCIA_ESCALONAMENTO: 4
} as const;

// ════════════════════════════════════════════════════════════════════════════
// IDENTIFICADORES DE REGRAS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Regras aplicadas pelo avaliador. A tabela de pilares carregada no boot
 * precisa declarar cada uma sob o pilar correto.
 */
const EthicsRuleId = {
  IMPACTO_HUMANO_DIRETO: 'VIDA_IMPACTO_HUMANO_DIRETO',
  REDESENHO_SEM_AUTONOMIA: 'CONTROLE_REDESENHO_NIVEL_INSUFICIENTE',
  EQUIDADE_GINI: 'EQUIDADE_DELTA_GINI',
  SUSTENTABILIDADE_CARBONO: 'SUSTENTABILIDADE_CARBONO',
  TRANSPARENCIA_EXPLICABILIDADE: 'TRANSPARENCIA_EXPLICABILIDADE',
  RISCO_CONSEQUENCIAS: 'CONTROLE_RISCO_CONSEQUENCIAS'
} as const;

type EthicsRuleIdType = typeof EthicsRuleId[keyof typeof EthicsRuleId];

/**
 * Pilar dono de cada regra aplicada.
 */
const RULE_PILLAR: Readonly<Record<EthicsRuleIdType, EthicalPillar>> = {
  [EthicsRuleId.IMPACTO_HUMANO_DIRETO]: EthicalPillar.PRESERVE_LIFE,
  [EthicsRuleId.REDESENHO_SEM_AUTONOMIA]: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
  [EthicsRuleId.EQUIDADE_GINI]: EthicalPillar.GLOBAL_EQUITY,
  [EthicsRuleId.SUSTENTABILIDADE_CARBONO]: EthicalPillar.SUSTAINABILITY,
  [EthicsRuleId.TRANSPARENCIA_EXPLICABILIDADE]: EthicalPillar.RADICAL_TRANSPARENCY,
  [EthicsRuleId.RISCO_CONSEQUENCIAS]: EthicalPillar.RESIDUAL_HUMAN_CONTROL
};

/**
 * Catálogo de sub-regras conhecidas: as aplicadas pelo avaliador mais as
 * declarativas (registradas para auditoria e explicação).
 */
const KNOWN_RULES: Readonly<Record<string, EthicalPillar>> = {
  ...RULE_PILLAR,
  VIDA_MARGEM_SEGURANCA: EthicalPillar.PRESERVE_LIFE,
  EQUIDADE_COMPENSACAO: EthicalPillar.GLOBAL_EQUITY,
  TRANSPARENCIA_JUSTIFICATIVA: EthicalPillar.RADICAL_TRANSPARENCY,
  SUSTENTABILIDADE_AGUA: EthicalPillar.SUSTAINABILITY,
  CONTROLE_REVERSIBILIDADE: EthicalPillar.RESIDUAL_HUMAN_CONTROL
};

const APPLIED_RULE_IDS: readonly EthicsRuleIdType[] = Object.values(EthicsRuleId);

// ════════════════════════════════════════════════════════════════════════════
// ESTÁGIO 1 — CHECAGENS DETERMINÍSTICAS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Impacto humano direto acima do limiar viola PRESERVE_LIFE.
 */
function checkImpactoHumanoDireto(impact: NormalizedImpact): RuleFinding | null {
  if (impact.directHumanImpact <= LIMIARES.IMPACTO_HUMANO_MAXIMO) {
    return null;
  }

  return {
    pillar: EthicalPillar.PRESERVE_LIFE,
    ruleId: EthicsRuleId.IMPACTO_HUMANO_DIRETO,
    message: `Impacto humano direto ${impact.directHumanImpact} excede o máximo ${LIMIARES.IMPACTO_HUMANO_MAXIMO}`
  };
}

/**
 * Redesenho de sistema abaixo do nível 4 viola RESIDUAL_HUMAN_CONTROL.
 */
function checkRedesenhoSemAutonomia(actionType: string, impact: NormalizedImpact): RuleFinding | null {
  if (actionType !== 'redesign_system' || impact.autonomyLevel >= LIMIARES.NIVEL_MINIMO_REDESENHO) {
    return null;
  }

  return {
    pillar: EthicalPillar.RESIDUAL_HUMAN_CONTROL,
    ruleId: EthicsRuleId.REDESENHO_SEM_AUTONOMIA,
    message: `Redesenho de sistema exige nível de autonomia ${LIMIARES.NIVEL_MINIMO_REDESENHO}; nível atual ${impact.autonomyLevel}`
  };
}

// ════════════════════════════════════════════════════════════════════════════
// ESTÁGIO 2 — CHECAGENS COMPOSTAS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Variação de Gini acima do limiar viola GLOBAL_EQUITY.
 */
function checkEquidadeDistributiva(impact: NormalizedImpact): RuleFinding | null {
  if (impact.giniDelta <= LIMIARES.GINI_DELTA_MAXIMO) {
    return null;
  }

  return {
    pillar: EthicalPillar.GLOBAL_EQUITY,
    ruleId: EthicsRuleId.EQUIDADE_GINI,
    message: `Impacto distributivo: delta Gini ${impact.giniDelta} excede o máximo ${LIMIARES.GINI_DELTA_MAXIMO}`
  };
}

/**
 * Carbono acima do limiar viola SUSTAINABILITY.
 */
function checkSustentabilidade(impact: NormalizedImpact): RuleFinding | null {
  if (impact.carbon <= LIMIARES.CARBONO_MAXIMO) {
    return null;
  }

  return {
    pillar: EthicalPillar.SUSTAINABILITY,
    ruleId: EthicsRuleId.SUSTENTABILIDADE_CARBONO,
    message: `Emissão estimada de ${impact.carbon} t de carbono excede o máximo ${LIMIARES.CARBONO_MAXIMO} t`
  };
}

/**
 * Ação sem explicabilidade viola RADICAL_TRANSPARENCY.
 */
function checkTransparencia(impact: NormalizedImpact): RuleFinding | null {
  if (impact.explainability) {
    return null;
  }

  return {
    pillar: EthicalPillar.RADICAL_TRANSPARENCY,
    ruleId: EthicsRuleId.TRANSPARENCIA_EXPLICABILIDADE,
    message: 'Ação não declara explicabilidade'
  };
}

/**
 * Executa as duas regras do estágio 1 e retorna todos os achados.
 */
function runStageOne(actionType: string, impact: NormalizedImpact): RuleFinding[] {
  return [
    checkImpactoHumanoDireto(impact),
    checkRedesenhoSemAutonomia(actionType, impact)
  ].filter((f): f is RuleFinding => f !== null);
}

/**
 * Executa as três regras do estágio 2 de forma independente.
 */
function runStageTwo(impact: NormalizedImpact): RuleFinding[] {
  return [
    checkEquidadeDistributiva(impact),
    checkSustentabilidade(impact),
    checkTransparencia(impact)
  ].filter((f): f is RuleFinding => f !== null);
}

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export {
  LIMIARES,
  EthicsRuleId,
  EthicsRuleIdType,
  RULE_PILLAR,
  KNOWN_RULES,
  APPLIED_RULE_IDS,
  checkImpactoHumanoDireto,
  checkRedesenhoSemAutonomia,
  checkEquidadeDistributiva,
  checkSustentabilidade,
  checkTransparencia,
  runStageOne,
  runStageTwo
};
