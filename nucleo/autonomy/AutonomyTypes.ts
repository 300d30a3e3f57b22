/**
 * FLUXO DE AUTONOMIA — Tipos
 *
 * Cinco níveis ordinais. Avanço é gradual (um nível por vez), passa por
 * critérios, janela de teste e aprovação. Reversão é imediata.
 *
 * PRINCÍPIOS:
 * - No máximo um avanço ativo por vez
 * - Reversão nunca espera processo
 * - Toda mudança de estado fica no stateHistory
 */

// ════════════════════════════════════════════════════════════════════════════
// NÍVEIS E PERMISSÕES
// ════════════════════════════════════════════════════════════════════════════

enum AutonomyLevel {
  ASSISTANCE = 1,
  SUPERVISED = 2,
  CONDITIONAL = 3,
  HIGH = 4,
  FULL = 5
}

const MIN_LEVEL = AutonomyLevel.ASSISTANCE;
const MAX_LEVEL = AutonomyLevel.FULL;

const ALL_LEVELS: readonly AutonomyLevel[] = [
  AutonomyLevel.ASSISTANCE,
  AutonomyLevel.SUPERVISED,
  AutonomyLevel.CONDITIONAL,
  AutonomyLevel.HIGH,
  AutonomyLevel.FULL
];

function isAutonomyLevel(value: unknown): value is AutonomyLevel {
  return typeof value === 'number' && ALL_LEVELS.some(l => l === value);
}

/**
 * Categorias de ação sujeitas a permissão por nível.
 */
type ActionCategory = 'hotfix' | 'refactor' | 'redesign' | 'evolution';

const ALL_CATEGORIES: readonly ActionCategory[] = ['hotfix', 'refactor', 'redesign', 'evolution'];

function isActionCategory(value: unknown): value is ActionCategory {
  return typeof value === 'string' && ALL_CATEGORIES.some(c => c === value);
}

type PermissionMap = Record<ActionCategory, boolean>;

/**
 * Critérios para avançar a partir de um nível.
 */
interface AdvancementCriteria {
  /** Precisão mínima, 0..1 */
  minPrecision: number;
  maxFalseNegatives: number;
  minDaysInOperation: number;
  maxIncidents: number;
  ethicsValidationRequired: boolean;
}

interface LevelDefinition {
  level: AutonomyLevel;
  name: string;
  permissions: Readonly<PermissionMap>;

  /** Ausente apenas no nível 5 (terminal para avanço) */
  advancementCriteria?: Readonly<AdvancementCriteria>;

  /** Janela de teste ao avançar PARA este nível. Ausente no nível 1 */
  testWindowDays?: number;
}

/**
 * Tabela de níveis validada no boot.
 */
interface LevelTable {
  byLevel: Readonly<Record<AutonomyLevel, LevelDefinition>>;

  /** tipo de ação → categoria */
  actionCategories: Readonly<Record<string, ActionCategory>>;
}

// ════════════════════════════════════════════════════════════════════════════
// MÉTRICAS
// ════════════════════════════════════════════════════════════════════════════

interface PerformanceMetrics {
  precision: number;
  falseNegatives: number;
  daysInOperation: number;
  incidents: number;
  ethicsApproved: boolean;
}

/**
 * Resultado de um critério individual (itemizado na rejeição).
 */
interface CriterionCheck {
  criterion: string;
  expected: string;
  actual: string;
  passed: boolean;
}

/**
 * Variação de uma métrica ao longo da janela de teste.
 */
interface MetricDelta {
  metric: keyof PerformanceMetrics;
  baseline: number | boolean;
  current: number | boolean;
  degraded: boolean;
  detail: string;
}

// ════════════════════════════════════════════════════════════════════════════
// TRANSIÇÕES
// ════════════════════════════════════════════════════════════════════════════

enum TransitionType {
  ADVANCEMENT = 'ADVANCEMENT',
  REVERSION = 'REVERSION'
}

enum TransitionState {
  REQUESTED = 'REQUESTED',
  TESTING = 'TESTING',
  PENDING_APPROVAL = 'PENDING_APPROVAL',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  COMPLETED = 'COMPLETED',
  REVERTED = 'REVERTED'
}

const TERMINAL_STATES: readonly TransitionState[] = [
  TransitionState.REJECTED,
  TransitionState.COMPLETED,
  TransitionState.REVERTED
];

interface StateHistoryEntry {
  state: TransitionState;
  /** ISO string */
  timestamp: string;
  comment: string;
}

interface TestWindow {
  startedAt: string;
  endsAt: string;
  days: number;
}

type GovernanceDecision = 'APPROVED' | 'REJECTED' | 'PENDING';

interface ApprovalRecord {
  decision: Exclude<GovernanceDecision, 'PENDING'>;
  approver: string;
  comment?: string;
  decidedAt: string;
}

interface TransitionRecord {
  id: string;
  type: TransitionType;
  originLevel: AutonomyLevel;
  destinationLevel: AutonomyLevel;
  state: TransitionState;
  stateHistory: StateHistoryEntry[];
  requestedBy: string;
  createdAt: string;
  updatedAt: string;

  // Avanço
  justification?: string;
  evidence?: Record<string, unknown>;
  criteriaChecks?: CriterionCheck[];
  baselineMetrics?: PerformanceMetrics;
  testWindow?: TestWindow;
  degradationChecks?: MetricDelta[];
  approval?: ApprovalRecord;
  rejectionReason?: string;

  // Reversão
  motive?: string;
  urgency?: number;
  cancelledAdvancementId?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// INPUTS
// ════════════════════════════════════════════════════════════════════════════

interface AdvancementRequest {
  origin: AutonomyLevel;
  destination: AutonomyLevel;
  justification: string;
  evidence?: Record<string, unknown>;
  requestedBy?: string;
}

interface ReversionRequest {
  origin: AutonomyLevel;
  destination: AutonomyLevel;
  motive: string;
  /** 1..5 */
  urgency?: number;
  requestedBy?: string;
}

interface ExternalDecision {
  decision: Exclude<GovernanceDecision, 'PENDING'>;
  approver: string;
  comment?: string;
}

export {
  AutonomyLevel,
  MIN_LEVEL,
  MAX_LEVEL,
  ALL_LEVELS,
  isAutonomyLevel,
  ActionCategory,
  ALL_CATEGORIES,
  isActionCategory,
  PermissionMap,
  AdvancementCriteria,
  LevelDefinition,
  LevelTable,
  PerformanceMetrics,
  CriterionCheck,
  MetricDelta,
  TransitionType,
  TransitionState,
  TERMINAL_STATES,
  StateHistoryEntry,
  TestWindow,
  GovernanceDecision,
  ApprovalRecord,
  TransitionRecord,
  AdvancementRequest,
  ReversionRequest,
  ExternalDecision
};
