/**
 * FLUXO DE AUTONOMIA — Critérios e Degradação
 *
 * Funções puras sobre métricas. Rejeições são itemizadas: cada critério
 * aparece no resultado com esperado, observado e se passou.
 */

import {
  AdvancementCriteria,
  CriterionCheck,
  MetricDelta,
  PerformanceMetrics
} from './AutonomyTypes';

// ════════════════════════════════════════════════════════════════════════════
// CRITÉRIOS DE AVANÇO
// ════════════════════════════════════════════════════════════════════════════

const CRITERIO = {
  PRECISAO_MINIMA: 'precisao_minima',
  FALSOS_NEGATIVOS_MAXIMOS: 'falsos_negativos_maximos',
  DIAS_OPERACAO_MINIMOS: 'dias_operacao_minimos',
  INCIDENTES_MAXIMOS: 'incidentes_maximos',
  VALIDACAO_ETICA: 'validacao_etica_obrigatoria'
} as const;

/**
 * Confronta as métricas com os critérios do nível de origem.
 */
function evaluateAdvancementCriteria(
  criteria: AdvancementCriteria,
  metrics: PerformanceMetrics
): CriterionCheck[] {
  return [
    {
      criterion: CRITERIO.PRECISAO_MINIMA,
      expected: `>= ${criteria.minPrecision}`,
      actual: String(metrics.precision),
      passed: metrics.precision >= criteria.minPrecision
    },
    {
      criterion: CRITERIO.FALSOS_NEGATIVOS_MAXIMOS,
      expected: `<= ${criteria.maxFalseNegatives}`,
      actual: String(metrics.falseNegatives),
      passed: metrics.falseNegatives <= criteria.maxFalseNegatives
    },
    {
      criterion: CRITERIO.DIAS_OPERACAO_MINIMOS,
      expected: `>= ${criteria.minDaysInOperation}`,
      actual: String(metrics.daysInOperation),
      passed: metrics.daysInOperation >= criteria.minDaysInOperation
    },
    {
      criterion: CRITERIO.INCIDENTES_MAXIMOS,
      expected: `<= ${criteria.maxIncidents}`,
      actual: String(metrics.incidents),
      passed: metrics.incidents <= criteria.maxIncidents
    },
    {
      criterion: CRITERIO.VALIDACAO_ETICA,
      expected: criteria.ethicsValidationRequired ? 'true' : 'não obrigatória',
      actual: String(metrics.ethicsApproved),
      passed: !criteria.ethicsValidationRequired || metrics.ethicsApproved
    }
  ];
}

function allPassed(checks: readonly CriterionCheck[]): boolean {
  return checks.every(c => c.passed);
}

function describeFailedChecks(checks: readonly CriterionCheck[]): string {
  return checks
    .filter(c => !c.passed)
    .map(c => `${c.criterion}: esperado ${c.expected}, observado ${c.actual}`)
    .join('; ');
}

// ════════════════════════════════════════════════════════════════════════════
// DEGRADAÇÃO NA JANELA DE TESTE
// ════════════════════════════════════════════════════════════════════════════

/** Queda relativa máxima de precisão aceita na janela de teste */
const TOLERANCIA_DEGRADACAO_PADRAO = 0.05;

/**
 * Queda relativa de precisão em relação à linha de base.
 * Linha de base zero não tem como degradar.
 */
function relativeDrop(baseline: number, current: number): number {
  if (baseline <= 0) return 0;
  return (baseline - current) / baseline;
}

/**
 * Compara métricas atuais com a linha de base capturada no início do teste.
 *
 * Degrada quando:
 * - precisão cai mais que a tolerância (relativa)
 * - falsos negativos ou incidentes aumentam
 * - aprovação ética se perde e o critério a exige
 */
function evaluateDegradation(
  baseline: PerformanceMetrics,
  current: PerformanceMetrics,
  tolerance: number = TOLERANCIA_DEGRADACAO_PADRAO,
  ethicsRequired: boolean = true
): MetricDelta[] {
  const drop = relativeDrop(baseline.precision, current.precision);

  return [
    {
      metric: 'precision',
      baseline: baseline.precision,
      current: current.precision,
      degraded: drop > tolerance,
      detail: `Queda relativa de precisão ${(drop * 100).toFixed(2)}% (tolerância ${(tolerance * 100).toFixed(2)}%)`
    },
    {
      metric: 'falseNegatives',
      baseline: baseline.falseNegatives,
      current: current.falseNegatives,
      degraded: current.falseNegatives > baseline.falseNegatives,
      detail: `Falsos negativos ${baseline.falseNegatives} → ${current.falseNegatives}`
    },
    {
      metric: 'incidents',
      baseline: baseline.incidents,
      current: current.incidents,
      degraded: current.incidents > baseline.incidents,
      detail: `Incidentes ${baseline.incidents} → ${current.incidents}`
    },
    {
      metric: 'ethicsApproved',
      baseline: baseline.ethicsApproved,
      current: current.ethicsApproved,
      degraded: ethicsRequired && !current.ethicsApproved,
      detail: `Aprovação ética ${baseline.ethicsApproved} → ${current.ethicsApproved}`
    }
  ];
}

function anyDegraded(deltas: readonly MetricDelta[]): boolean {
  return deltas.some(d => d.degraded);
}

function describeDegradation(deltas: readonly MetricDelta[]): string {
  return deltas.filter(d => d.degraded).map(d => d.detail).join('; ');
}

export {
  CRITERIO,
  TOLERANCIA_DEGRADACAO_PADRAO,
  evaluateAdvancementCriteria,
  allPassed,
  describeFailedChecks,
  evaluateDegradation,
  anyDegraded,
  describeDegradation,
  relativeDrop
};
