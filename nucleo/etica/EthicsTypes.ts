/**
 * CIRCUITOS MORAIS — Tipos Principais
 *
 * Define os pilares éticos, a ação proposta e o resultado da verificação.
 *
 * PRINCÍPIOS:
 * - Ação proposta é imutável depois de criada
 * - Todo veredito carrega justificativa e pilares violados
 * - Rejeição e escalonamento sempre trazem alternativas
 */

// ════════════════════════════════════════════════════════════════════════════
// PILARES ÉTICOS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Os cinco pilares contra os quais toda ação é verificada.
 * A prioridade (1 = mais alta) vem da tabela de regras carregada no boot.
 */
enum EthicalPillar {
  PRESERVE_LIFE = 'PRESERVE_LIFE',
  GLOBAL_EQUITY = 'GLOBAL_EQUITY',
  RADICAL_TRANSPARENCY = 'RADICAL_TRANSPARENCY',
  SUSTAINABILITY = 'SUSTAINABILITY',
  RESIDUAL_HUMAN_CONTROL = 'RESIDUAL_HUMAN_CONTROL'
}

const ALL_PILLARS: readonly EthicalPillar[] = [
  EthicalPillar.PRESERVE_LIFE,
  EthicalPillar.GLOBAL_EQUITY,
  EthicalPillar.RADICAL_TRANSPARENCY,
  EthicalPillar.SUSTAINABILITY,
  EthicalPillar.RESIDUAL_HUMAN_CONTROL
];

function isEthicalPillar(value: unknown): value is EthicalPillar {
  return typeof value === 'string' && (ALL_PILLARS as readonly string[]).includes(value);
}

/**
 * Sub-regra nomeada de um pilar.
 */
interface PillarRule {
  id: string;
  description: string;
}

/**
 * Definição de um pilar na tabela estática.
 */
interface PillarDefinition {
  pillar: EthicalPillar;

  /** Nome legível */
  name: string;

  /** 1 = prioridade mais alta */
  priority: number;

  /** Sub-regras em ordem */
  rules: readonly PillarRule[];
}

/**
 * Tabela de pilares validada no boot. Imutável durante o processo.
 */
interface PillarRuleTable {
  byPillar: Readonly<Record<EthicalPillar, PillarDefinition>>;

  /** Pilares ordenados por prioridade */
  ordered: readonly PillarDefinition[];
}

// ════════════════════════════════════════════════════════════════════════════
// AÇÃO PROPOSTA
// ════════════════════════════════════════════════════════════════════════════

/**
 * Impacto estimado declarado pelo chamador.
 * Todos os campos são opcionais: ausências viram defaults seguros
 * (ver normalizeImpact).
 */
interface EstimatedImpact {
  /** Impacto humano direto, 0..1 */
  directHumanImpact?: number;

  distributiveImpact?: {
    /** Variação do índice de Gini provocada pela ação */
    giniDelta?: number;
  };

  environmentalImpact?: {
    /** Toneladas de CO2 */
    carbon?: number;
    /** Metros cúbicos de água */
    water?: number;
  };

  reversible?: boolean;

  testedPreviously?: boolean;

  /** Complexidade 1..5 */
  complexity?: number;
}

/**
 * Contexto da ação. `autonomyLevel` é o nível vigente no momento da proposta.
 */
interface ActionContext {
  autonomyLevel?: number;
  [key: string]: unknown;
}

/**
 * Input para criação de uma ação proposta.
 */
interface ProposedActionInput {
  actionType: string;
  parameters?: Record<string, unknown>;
  context?: ActionContext;
  estimatedImpact?: EstimatedImpact;
  /** Urgência 1..5 */
  urgency?: number;
  justification?: string;
}

/**
 * Ação proposta pelo sistema. Imutável (congelada na criação).
 */
interface ProposedAction {
  /** tipo-da-acao + timestamp */
  readonly id: string;
  readonly actionType: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly context: Readonly<ActionContext>;
  readonly estimatedImpact: Readonly<EstimatedImpact>;
  readonly urgency: number;
  readonly justification: string;
  /** ISO string */
  readonly createdAt: string;
}

/**
 * Impacto com defaults aplicados. Único formato visto pelas regras.
 */
interface NormalizedImpact {
  directHumanImpact: number;
  giniDelta: number;
  carbon: number;
  water: number;
  reversible: boolean;
  testedPreviously: boolean;
  complexity: number;
  urgency: number;
  autonomyLevel: number;
  explainability: boolean;
}

// ════════════════════════════════════════════════════════════════════════════
// RESULTADO DA VERIFICAÇÃO
// ════════════════════════════════════════════════════════════════════════════

enum VerificationStatus {
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  NEEDS_REVIEW = 'NEEDS_REVIEW'
}

/**
 * Estágio da cascata que produziu o veredito.
 * 1 = checagens determinísticas, 2 = checagens compostas, 3 = risco de consequências.
 */
type VerificationStage = 1 | 2 | 3;

/**
 * Achado de uma regra: qual pilar, qual regra, por quê.
 */
interface RuleFinding {
  pillar: EthicalPillar;
  ruleId: string;
  message: string;
}

/**
 * Alternativa sugerida: cópia rasa da ação original com um ajuste pontual.
 */
interface AlternativeAction {
  /** Pilar que motivou a alternativa (ausente na alternativa genérica) */
  pillar?: EthicalPillar;
  description: string;
  /** Parâmetros sobrescritos em relação à ação original */
  overrides: Record<string, unknown>;
  action: ProposedAction;
}

/**
 * Resultado de uma verificação. Criado uma vez por chamada.
 */
interface VerificationResult {
  id: string;
  actionId: string;
  status: VerificationStatus;
  stage: VerificationStage;
  justification: string;
  /** Sem repetição, em ordem de prioridade do pilar */
  violatedPillars: EthicalPillar[];
  findings: RuleFinding[];
  suggestedAlternatives: AlternativeAction[];
  /** Presente quando o estágio 3 rodou */
  riskScore?: number;
  /** Nota de cautela para risco moderado aprovado */
  caution?: string;
  /** ISO string */
  timestamp: string;
}

/**
 * Veredito puro produzido pelo avaliador (sem id/timestamp).
 */
type EvaluationOutcome = Omit<VerificationResult, 'id' | 'actionId' | 'timestamp'>;

// ════════════════════════════════════════════════════════════════════════════
// EXPLICAÇÃO
// ════════════════════════════════════════════════════════════════════════════

/**
 * Escala qualitativa de impacto por pilar.
 */
type QualitativeImpact = 'NENHUM' | 'BAIXO' | 'MODERADO' | 'ALTO';

interface PillarImpactBreakdown {
  pillar: EthicalPillar;
  impact: QualitativeImpact;
  detail: string;
}

interface ExplainedViolation {
  pillar: EthicalPillar;
  pillarName: string;
  priority: number;
  rules: Array<{ id: string; description: string; message: string }>;
}

/**
 * Explicação de uma verificação registrada. Leitura pura do histórico.
 */
interface VerificationExplanation {
  verificationId: string;
  status: VerificationStatus;
  stage: VerificationStage;
  justification: string;
  action: {
    id: string;
    actionType: string;
    urgency: number;
    autonomyLevel: number;
    justification: string;
  };
  violations: ExplainedViolation[];
  impactBreakdown: PillarImpactBreakdown[];
  alternatives: AlternativeAction[];
  riskScore?: number;
  timestamp: string;
}

/**
 * Estatísticas agregadas do histórico de verificações.
 */
interface VerificationStatistics {
  total: number;
  byStatus: Record<VerificationStatus, number>;
  violationsByPillar: Record<EthicalPillar, number>;
  /** Registros descartados pelo limite de capacidade */
  evicted: number;
}

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

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
};
