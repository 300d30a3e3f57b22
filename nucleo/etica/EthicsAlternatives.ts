/**
 * CIRCUITOS MORAIS — Geração de Alternativas
 *
 * Para cada pilar violado que tem ajuste dirigido, uma alternativa.
 * Se nenhum ajuste dirigido se aplica, uma alternativa genérica de escopo reduzido.
 */

import { AlternativeAction, EthicalPillar, ProposedAction } from './EthicsTypes';
import { withParameters } from './EthicsImpact';

type PillarAdjuster = (action: ProposedAction) => { description: string; overrides: Record<string, unknown> };

function numericParam(action: ProposedAction, key: string, fallback: number): number {
  const value = action.parameters[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Ajustes dirigidos por pilar. Pilares ausentes não têm ajuste próprio.
 */
const PILLAR_ADJUSTERS: Partial<Record<EthicalPillar, PillarAdjuster>> = {
  [EthicalPillar.PRESERVE_LIFE]: action => ({
    description: 'Dobrar a margem de segurança',
    overrides: { safetyMargin: numericParam(action, 'safetyMargin', 1) * 2 }
  }),
  [EthicalPillar.GLOBAL_EQUITY]: () => ({
    description: 'Incluir mecanismo de compensação distributiva',
    overrides: { includeCompensation: true }
  }),
  [EthicalPillar.RADICAL_TRANSPARENCY]: () => ({
    description: 'Exigir explicabilidade da decisão',
    overrides: { explainability: true }
  })
};

function genericAlternative(action: ProposedAction): AlternativeAction {
  const overrides = {
    reducedScope: true,
    scopeFactor: numericParam(action, 'scopeFactor', 1) / 2
  };
  return {
    description: 'Executar com escopo reduzido',
    overrides,
    action: withParameters(action, overrides)
  };
}

/**
 * Gera alternativas na ordem dos pilares recebidos.
 */
function generateAlternatives(action: ProposedAction, violatedPillars: readonly EthicalPillar[]): AlternativeAction[] {
  const alternatives: AlternativeAction[] = [];

  for (const pillar of violatedPillars) {
    const adjuster = PILLAR_ADJUSTERS[pillar];
    if (!adjuster) continue;

    const { description, overrides } = adjuster(action);
    alternatives.push({
      pillar,
      description,
      overrides,
      action: withParameters(action, overrides)
    });
  }

  if (alternatives.length === 0) {
    alternatives.push(genericAlternative(action));
  }

  return alternatives;
}

export { generateAlternatives, PILLAR_ADJUSTERS };
