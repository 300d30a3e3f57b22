/**
 * ORQUESTRADOR — Gate de Ações
 *
 * Fluxo de controle de cada ação proposta:
 * 1. Resolve a categoria (explícita ou pelo mapa da tabela de níveis)
 * 2. Bloqueia se o nível atual não permite a categoria (sem rodar ética)
 * 3. Carimba o nível atual no contexto e verifica no gate ético
 * 4. Traduz o veredito em EXECUTE / REJECTED / ESCALATED
 *
 * Tipos de ação sem categoria não passam pela checagem de permissão.
 */

import { Logger, createLogger } from '../utilitarios/Logger';
import { TipoEvento, TipoEntidade } from '../event-log/EventLogEntry';
import { NotificationDispatcher } from '../notificacao/NotificationDispatcher';
import { NotificationSeverity } from '../notificacao/NotificationTypes';
import {
  ProposedAction,
  ProposedActionInput,
  VerificationResult,
  VerificationStatus
} from '../etica/EthicsTypes';
import { createProposedAction } from '../etica/EthicsImpact';
import { EthicalGate } from '../etica/EthicalGate';
import { ActionCategory, AutonomyLevel } from '../autonomy/AutonomyTypes';
import { AutonomyFlow } from '../autonomy/AutonomyFlow';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

interface ActionGateInput extends ProposedActionInput {
  /** Sobrescreve o mapa tipo de ação → categoria */
  category?: ActionCategory;
}

enum ActionGateOutcome {
  EXECUTE = 'EXECUTE',
  REJECTED = 'REJECTED',
  ESCALATED = 'ESCALATED',
  BLOCKED_BY_AUTONOMY = 'BLOCKED_BY_AUTONOMY'
}

interface ActionGateResult {
  outcome: ActionGateOutcome;
  /** true apenas para EXECUTE */
  executar: boolean;
  action: ProposedAction;
  category: ActionCategory | null;
  autonomyLevel: AutonomyLevel;
  motivo: string;
  /** Ausente quando bloqueada por autonomia */
  verification?: VerificationResult;
}

interface ActionGateContext {
  ethicalGate: EthicalGate;
  autonomyFlow: AutonomyFlow;
  logger?: Logger;
  dispatcher?: NotificationDispatcher;
  clock?: () => Date;
}

const OUTCOME_POR_STATUS: Readonly<Record<VerificationStatus, ActionGateOutcome>> = {
  [VerificationStatus.APPROVED]: ActionGateOutcome.EXECUTE,
  [VerificationStatus.REJECTED]: ActionGateOutcome.REJECTED,
  [VerificationStatus.NEEDS_REVIEW]: ActionGateOutcome.ESCALATED
};

// ════════════════════════════════════════════════════════════════════════════
// GATE
// ════════════════════════════════════════════════════════════════════════════

class ActionGate {
  private readonly ethicalGate: EthicalGate;
  private readonly autonomyFlow: AutonomyFlow;
  private readonly logger: Logger;
  private readonly dispatcher?: NotificationDispatcher;
  private readonly clock: () => Date;

  constructor(context: ActionGateContext) {
    this.ethicalGate = context.ethicalGate;
    this.autonomyFlow = context.autonomyFlow;
    this.logger = context.logger ?? createLogger('gate-acoes');
    this.dispatcher = context.dispatcher;
    this.clock = context.clock ?? (() => new Date());
  }

  evaluate(input: ActionGateInput): ActionGateResult {
    const now = this.clock();
    const autonomyLevel = this.autonomyFlow.currentLevel();
    const category = input.category ?? this.autonomyFlow.resolveCategory(input.actionType);

    const action = createProposedAction(
      {
        actionType: input.actionType,
        parameters: input.parameters,
        context: { ...input.context, autonomyLevel },
        estimatedImpact: input.estimatedImpact,
        urgency: input.urgency,
        justification: input.justification
      },
      now
    );

    if (category !== null && !this.autonomyFlow.isCategoryAllowed(category)) {
      return this.block(action, category, autonomyLevel, now);
    }

    const verification = this.ethicalGate.verify(action);
    const outcome = OUTCOME_POR_STATUS[verification.status];

    this.logger.info(
      { actionId: action.id, category, autonomyLevel, outcome, verificationId: verification.id },
      `Ação ${action.actionType}: ${outcome}`
    );

    return {
      outcome,
      executar: outcome === ActionGateOutcome.EXECUTE,
      action,
      category,
      autonomyLevel,
      motivo: verification.justification,
      verification
    };
  }

  private block(
    action: ProposedAction,
    category: ActionCategory,
    autonomyLevel: AutonomyLevel,
    now: Date
  ): ActionGateResult {
    const motivo = `Categoria ${category} não permitida no nível ${autonomyLevel} (${AutonomyLevel[autonomyLevel]})`;

    this.logger.warn({ actionId: action.id, category, autonomyLevel }, motivo);
    this.dispatcher?.dispatch({
      tipo: TipoEvento.ACAO_BLOQUEADA_AUTONOMIA,
      entidade: TipoEntidade.ACAO,
      entidadeId: action.id,
      timestamp: now.toISOString(),
      severidade: NotificationSeverity.WARNING,
      motivo,
      nivelOrigem: autonomyLevel,
      urgencia: action.urgency,
      status: ActionGateOutcome.BLOCKED_BY_AUTONOMY,
      dados: { actionType: action.actionType, category }
    });

    return {
      outcome: ActionGateOutcome.BLOCKED_BY_AUTONOMY,
      executar: false,
      action,
      category,
      autonomyLevel,
      motivo
    };
  }
}

export { ActionGate, ActionGateContext, ActionGateInput, ActionGateOutcome, ActionGateResult };
