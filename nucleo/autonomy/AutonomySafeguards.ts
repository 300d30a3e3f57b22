/**
 * FLUXO DE AUTONOMIA — Salvaguardas
 *
 * Incidentes reduzem a autonomia imediatamente, via reversão.
 *
 * REGRAS (avaliadas em ordem, primeira que casa decide):
 * 1. Severidade CRITICA → nível 1
 * 2. Categoria ETICA com severidade ALTA → nível 1
 * 3. Severidade ALTA → um nível abaixo
 * 4. Demais → nenhuma ação
 * Já no nível 1 → nenhuma ação.
 *
 * A avaliação é pura. SafeguardService aplica a decisão no fluxo.
 */

import { Logger, createLogger } from '../utilitarios/Logger';
import { generateId } from '../utilitarios/IdUtil';
import { TipoEvento, TipoEntidade } from '../event-log/EventLogEntry';
import { NotificationDispatcher } from '../notificacao/NotificationDispatcher';
import { NotificationSeverity } from '../notificacao/NotificationTypes';
import { AutonomyLevel, MIN_LEVEL, isAutonomyLevel } from './AutonomyTypes';
import { FlowResult } from './AutonomyErrors';
import { AutonomyFlow } from './AutonomyFlow';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

type IncidentCategory = 'ETICA' | 'SEGURANCA' | 'DESEMPENHO' | 'OPERACIONAL';

type IncidentSeverity = 'BAIXA' | 'MEDIA' | 'ALTA' | 'CRITICA';

interface Incident {
  id?: string;
  categoria: IncidentCategory;
  severidade: IncidentSeverity;
  descricao: string;
}

const SafeguardRuleId = {
  SEVERIDADE_CRITICA: 'SALVAGUARDA_SEVERIDADE_CRITICA',
  VIOLACAO_ETICA: 'SALVAGUARDA_VIOLACAO_ETICA',
  SEVERIDADE_ALTA: 'SALVAGUARDA_SEVERIDADE_ALTA',
  JA_NO_MINIMO: 'SALVAGUARDA_JA_NO_MINIMO',
  SEM_GATILHO: 'SALVAGUARDA_SEM_GATILHO'
} as const;

type SafeguardRuleIdType = typeof SafeguardRuleId[keyof typeof SafeguardRuleId];

interface SafeguardDecision {
  action: 'REVERTER' | 'NENHUMA';
  targetLevel?: AutonomyLevel;
  ruleId: SafeguardRuleIdType;
  reason: string;
}

// ════════════════════════════════════════════════════════════════════════════
// REGRAS
// ════════════════════════════════════════════════════════════════════════════

function evaluateSafeguard(incident: Incident, currentLevel: AutonomyLevel): SafeguardDecision {
  if (currentLevel <= MIN_LEVEL) {
    return {
      action: 'NENHUMA',
      ruleId: SafeguardRuleId.JA_NO_MINIMO,
      reason: 'Autonomia já está no nível mínimo'
    };
  }

  if (incident.severidade === 'CRITICA') {
    return {
      action: 'REVERTER',
      targetLevel: MIN_LEVEL,
      ruleId: SafeguardRuleId.SEVERIDADE_CRITICA,
      reason: `Incidente crítico (${incident.categoria}): ${incident.descricao}`
    };
  }

  if (incident.categoria === 'ETICA' && incident.severidade === 'ALTA') {
    return {
      action: 'REVERTER',
      targetLevel: MIN_LEVEL,
      ruleId: SafeguardRuleId.VIOLACAO_ETICA,
      reason: `Violação ética grave: ${incident.descricao}`
    };
  }

  if (incident.severidade === 'ALTA') {
    const below = currentLevel - 1;
    return {
      action: 'REVERTER',
      targetLevel: isAutonomyLevel(below) ? below : MIN_LEVEL,
      ruleId: SafeguardRuleId.SEVERIDADE_ALTA,
      reason: `Incidente de severidade alta (${incident.categoria}): ${incident.descricao}`
    };
  }

  return {
    action: 'NENHUMA',
    ruleId: SafeguardRuleId.SEM_GATILHO,
    reason: `Severidade ${incident.severidade} não aciona salvaguarda`
  };
}

// ════════════════════════════════════════════════════════════════════════════
// SERVIÇO
// ════════════════════════════════════════════════════════════════════════════

interface SafeguardServiceContext {
  flow: AutonomyFlow;
  logger?: Logger;
  dispatcher?: NotificationDispatcher;
  clock?: () => Date;
}

interface SafeguardOutcome {
  incidentId: string;
  decision: SafeguardDecision;
  /** Presente quando uma reversão foi solicitada */
  reversion?: FlowResult;
}

const URGENCIA_POR_SEVERIDADE: Readonly<Record<IncidentSeverity, number>> = {
  BAIXA: 1,
  MEDIA: 2,
  ALTA: 4,
  CRITICA: 5
};

class SafeguardService {
  private readonly flow: AutonomyFlow;
  private readonly logger: Logger;
  private readonly dispatcher?: NotificationDispatcher;
  private readonly clock: () => Date;

  constructor(context: SafeguardServiceContext) {
    this.flow = context.flow;
    this.logger = context.logger ?? createLogger('salvaguardas');
    this.dispatcher = context.dispatcher;
    this.clock = context.clock ?? (() => new Date());
  }

  /**
   * Avalia o incidente contra o nível atual e, se for o caso, reverte.
   */
  apply(incident: Incident): SafeguardOutcome {
    const incidentId = incident.id ?? generateId('incidente');
    const origin = this.flow.currentLevel();
    const decision = evaluateSafeguard(incident, origin);

    if (decision.action === 'NENHUMA' || decision.targetLevel === undefined) {
      this.logger.info({ incidentId, ruleId: decision.ruleId }, decision.reason);
      return { incidentId, decision };
    }

    const urgency = URGENCIA_POR_SEVERIDADE[incident.severidade];
    this.dispatcher?.dispatch({
      tipo: TipoEvento.SALVAGUARDA_ACIONADA,
      entidade: TipoEntidade.INCIDENTE,
      entidadeId: incidentId,
      timestamp: this.clock().toISOString(),
      severidade: NotificationSeverity.CRITICAL,
      motivo: decision.reason,
      nivelOrigem: origin,
      nivelDestino: decision.targetLevel,
      urgencia: urgency,
      dados: { categoria: incident.categoria, severidade: incident.severidade, ruleId: decision.ruleId }
    });

    const reversion = this.flow.requestReversion({
      origin,
      destination: decision.targetLevel,
      motive: decision.reason,
      urgency,
      requestedBy: 'salvaguardas'
    });

    if (reversion.ok) {
      this.logger.warn({ incidentId, transitionId: reversion.value.id, ruleId: decision.ruleId }, decision.reason);
    } else {
      this.logger.error({ incidentId, code: reversion.error.code }, reversion.error.message);
    }

    return { incidentId, decision, reversion };
  }
}

export {
  IncidentCategory,
  IncidentSeverity,
  Incident,
  SafeguardRuleId,
  SafeguardRuleIdType,
  SafeguardDecision,
  SafeguardOutcome,
  SafeguardServiceContext,
  URGENCIA_POR_SEVERIDADE,
  evaluateSafeguard,
  SafeguardService
};
