/**
 * CIRCUITOS MORAIS — Criação de Ação e Normalização de Impacto
 *
 * Payloads heterogêneos chegam de vários produtores. Campos ausentes ou
 * inválidos viram defaults: números → 0 (menos restritivo), booleanos → false.
 * Infinito não é inválido: é limitado ao extremo da faixa do campo.
 */

import {
  ProposedAction,
  ProposedActionInput,
  NormalizedImpact
} from './EthicsTypes';
import { generateActionId } from '../utilitarios/IdUtil';

const URGENCY_MIN = 1;
const URGENCY_MAX = 5;
const COMPLEXITY_MIN = 1;
const COMPLEXITY_MAX = 5;

const LEVEL_MIN = 1;
const LEVEL_MAX = 5;

/** Nível assumido quando o contexto não informa (ASSISTANCE) */
const DEFAULT_AUTONOMY_LEVEL = 1;

/** NaN e não-números viram o fallback; ±Infinity passa adiante */
function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && !Number.isNaN(value) ? value : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function flag(value: unknown): boolean {
  return value === true;
}

/**
 * Cria ação proposta imutável.
 * ID = tipo da ação + timestamp.
 */
function createProposedAction(input: ProposedActionInput, now: Date = new Date()): ProposedAction {
  const action: ProposedAction = {
    id: generateActionId(input.actionType, now),
    actionType: input.actionType,
    parameters: Object.freeze({ ...(input.parameters ?? {}) }),
    context: Object.freeze({ ...(input.context ?? {}) }),
    estimatedImpact: Object.freeze({ ...(input.estimatedImpact ?? {}) }),
    urgency: Math.round(clamp(numberOr(input.urgency, URGENCY_MIN), URGENCY_MIN, URGENCY_MAX)),
    justification: input.justification ?? '',
    createdAt: now.toISOString()
  };
  return Object.freeze(action);
}

/**
 * Deriva uma nova ação a partir de outra, sobrescrevendo parâmetros.
 * Mantém id e timestamps do original (a alternativa não é uma nova proposta).
 */
function withParameters(action: ProposedAction, overrides: Record<string, unknown>): ProposedAction {
  return Object.freeze({
    ...action,
    parameters: Object.freeze({ ...action.parameters, ...overrides })
  });
}

/**
 * Aplica defaults seguros ao impacto estimado.
 *
 * `reversible` e `testedPreviously` são lidos do impacto e, na ausência,
 * dos parâmetros da ação.
 */
function normalizeImpact(action: ProposedAction): NormalizedImpact {
  const impact = action.estimatedImpact ?? {};
  const params = action.parameters ?? {};
  const context = action.context ?? {};

  // Valores não-objeto (ex: número) resultam em campos undefined, nunca em erro
  const distributive: { giniDelta?: unknown } = impact.distributiveImpact ?? {};
  const environmental: { carbon?: unknown; water?: unknown } = impact.environmentalImpact ?? {};

  return {
    directHumanImpact: clamp(numberOr(impact.directHumanImpact, 0), 0, 1),
    giniDelta: numberOr(distributive.giniDelta, 0),
    carbon: numberOr(environmental.carbon, 0),
    water: numberOr(environmental.water, 0),
    reversible: flag(impact.reversible ?? params.reversible),
    testedPreviously: flag(impact.testedPreviously ?? params.testedPreviously),
    complexity: Math.round(clamp(numberOr(impact.complexity, COMPLEXITY_MIN), COMPLEXITY_MIN, COMPLEXITY_MAX)),
    urgency: Math.round(clamp(numberOr(action.urgency, URGENCY_MIN), URGENCY_MIN, URGENCY_MAX)),
    autonomyLevel: Math.round(clamp(numberOr(context.autonomyLevel, DEFAULT_AUTONOMY_LEVEL), LEVEL_MIN, LEVEL_MAX)),
    explainability: Boolean(params.explainability)
  };
}

export {
  createProposedAction,
  withParameters,
  normalizeImpact,
  DEFAULT_AUTONOMY_LEVEL
};
