/**
 * FLUXO DE AUTONOMIA
 *
 * Barrel export: cinco níveis, avanço gradual com critérios, janela de
 * teste e governança, reversão imediata e salvaguardas por incidente.
 */

// Tipos
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
} from './AutonomyTypes';

// Erros e resultado
export {
  AutonomyError,
  AutonomyErrorCode,
  AutonomyErrorCodeType,
  AutonomyValidationError,
  LevelTableError,
  FlowResult
} from './AutonomyErrors';

// Critérios (puros)
export {
  CRITERIO,
  TOLERANCIA_DEGRADACAO_PADRAO,
  evaluateAdvancementCriteria,
  evaluateDegradation,
  allPassed,
  anyDegraded
} from './AutonomyCriteria';

// Colaboradores externos
export {
  MetricsProvider,
  InMemoryMetricsProvider,
  GovernanceAuthority,
  AutoApproveGovernance,
  ManualGovernance
} from './AutonomyPorts';

// Fluxo e salvaguardas
export { AutonomyFlow, AutonomyFlowContext, MOTIVO_CANCELAMENTO } from './AutonomyFlow';
export {
  Incident,
  IncidentCategory,
  IncidentSeverity,
  SafeguardRuleId,
  SafeguardDecision,
  SafeguardOutcome,
  evaluateSafeguard,
  SafeguardService
} from './AutonomySafeguards';
