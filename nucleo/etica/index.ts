/**
 * CIRCUITOS MORAIS
 *
 * Barrel export do gate ético: cascata de três estágios sobre os cinco
 * pilares, alternativas, histórico e explicação.
 */

// Tipos
export {
  EthicalPillar,
  ALL_PILLARS,
  isEthicalPillar,
  PillarRule,
  PillarDefinition,
  PillarRuleTable,
  EstimatedImpact,
  ActionContext,
  ProposedActionInput,
  ProposedAction,
  NormalizedImpact,
  VerificationStatus,
  VerificationStage,
  RuleFinding,
  AlternativeAction,
  VerificationResult,
  EvaluationOutcome,
  QualitativeImpact,
  PillarImpactBreakdown,
  ExplainedViolation,
  VerificationExplanation,
  VerificationStatistics
} from './EthicsTypes';

// Erros
export { EthicsError, RuleTableError } from './EthicsErrors';

// Regras e avaliador puro
export {
  LIMIARES,
  EthicsRuleId,
  EthicsRuleIdType,
  RULE_PILLAR,
  KNOWN_RULES,
  APPLIED_RULE_IDS,
  runStageOne,
  runStageTwo
} from './EthicsRules';
export { PESOS_RISCO, RiskBand, computeConsequenceRisk, classifyRisk } from './EthicsRisk';
export { createProposedAction, withParameters, normalizeImpact, DEFAULT_AUTONOMY_LEVEL } from './EthicsImpact';
export { generateAlternatives } from './EthicsAlternatives';
export { evaluateAction, orderPillars } from './EthicsEvaluator';

// Histórico, explicação e serviço
export { VerificationHistory, VerificationRecord, DEFAULT_HISTORY_CAPACITY } from './VerificationHistory';
export { buildExplanation } from './EthicsExplain';
export { EthicalGate, EthicalGateContext } from './EthicalGate';
