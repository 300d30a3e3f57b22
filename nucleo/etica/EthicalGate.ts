/**
 * CIRCUITOS MORAIS — Gate Ético
 *
 * Serviço que envolve o avaliador puro:
 * - cria a ação proposta (quando recebe input cru)
 * - avalia a cascata de três estágios
 * - registra o veredito no histórico
 * - loga e notifica
 *
 * PRINCÍPIOS:
 * - verify() é síncrono e nunca lança por causa do payload
 * - explain() é leitura pura do histórico
 * - Notificação é fire-and-forget
 */

import { Logger, createLogger } from '../utilitarios/Logger';
import { generateId } from '../utilitarios/IdUtil';
import { TipoEvento, TipoEntidade } from '../event-log/EventLogEntry';
import { NotificationDispatcher } from '../notificacao/NotificationDispatcher';
import { NotificationSeverity } from '../notificacao/NotificationTypes';
import {
  PillarRuleTable,
  ProposedAction,
  ProposedActionInput,
  VerificationExplanation,
  VerificationResult,
  VerificationStatistics,
  VerificationStatus
} from './EthicsTypes';
import { createProposedAction, normalizeImpact } from './EthicsImpact';
import { evaluateAction } from './EthicsEvaluator';
import { VerificationHistory, DEFAULT_HISTORY_CAPACITY, cloneResult } from './VerificationHistory';
import { buildExplanation } from './EthicsExplain';

// ════════════════════════════════════════════════════════════════════════════
// CONTEXTO
// ════════════════════════════════════════════════════════════════════════════

interface EthicalGateContext {
  /** Tabela de pilares validada no boot */
  ruleTable: PillarRuleTable;

  /** Limite do histórico de verificações (default 10000) */
  historyCapacity?: number;

  logger?: Logger;

  dispatcher?: NotificationDispatcher;

  /** Relógio injetável (testes) */
  clock?: () => Date;
}

const EVENTO_POR_STATUS: Readonly<Record<VerificationStatus, TipoEvento>> = {
  [VerificationStatus.APPROVED]: TipoEvento.ACAO_APROVADA,
  [VerificationStatus.REJECTED]: TipoEvento.ACAO_REJEITADA,
  [VerificationStatus.NEEDS_REVIEW]: TipoEvento.ACAO_ESCALADA_REVISAO
};

function isProposedAction(value: ProposedAction | ProposedActionInput): value is ProposedAction {
  return 'id' in value && 'createdAt' in value;
}

// ════════════════════════════════════════════════════════════════════════════
// SERVIÇO
// ════════════════════════════════════════════════════════════════════════════

class EthicalGate {
  private readonly ruleTable: PillarRuleTable;
  private readonly history: VerificationHistory;
  private readonly logger: Logger;
  private readonly dispatcher?: NotificationDispatcher;
  private readonly clock: () => Date;

  constructor(context: EthicalGateContext) {
    this.ruleTable = context.ruleTable;
    this.history = new VerificationHistory(context.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.logger = context.logger ?? createLogger('circuitos-morais');
    this.dispatcher = context.dispatcher;
    this.clock = context.clock ?? (() => new Date());
  }

  /**
   * Verifica uma ação contra os pilares éticos.
   *
   * @param input - Ação já criada ou input para criá-la
   */
  verify(input: ProposedAction | ProposedActionInput): VerificationResult {
    const now = this.clock();
    const action = isProposedAction(input) ? input : createProposedAction(input, now);

    const outcome = evaluateAction(action, this.ruleTable);
    const result: VerificationResult = {
      id: generateId('verif'),
      actionId: action.id,
      ...outcome,
      timestamp: now.toISOString()
    };

    this.history.add({ result, action, impact: normalizeImpact(action) });
    this.log(result, action);
    this.notify(result, action);

    return cloneResult(result);
  }

  /**
   * Explica uma verificação registrada. null se o id não está no histórico
   * (desconhecido ou já descartado pelo limite de capacidade).
   */
  explain(verificationId: string): VerificationExplanation | null {
    const record = this.history.get(verificationId);
    return record ? buildExplanation(record, this.ruleTable) : null;
  }

  getVerification(verificationId: string): VerificationResult | null {
    return this.history.get(verificationId)?.result ?? null;
  }

  getHistory(): VerificationResult[] {
    return this.history.list();
  }

  getStatistics(): VerificationStatistics {
    return this.history.statistics();
  }

  // ══════════════════════════════════════════════════════════════════════════
  // AUDITORIA
  // ══════════════════════════════════════════════════════════════════════════

  private log(result: VerificationResult, action: ProposedAction): void {
    const fields = {
      verificationId: result.id,
      actionId: action.id,
      actionType: action.actionType,
      status: result.status,
      stage: result.stage,
      violatedPillars: result.violatedPillars,
      riskScore: result.riskScore
    };

    if (result.status !== VerificationStatus.APPROVED) {
      this.logger.warn(fields, result.justification);
    } else if (result.caution) {
      this.logger.warn(fields, result.caution);
    } else {
      this.logger.info(fields, result.justification);
    }
  }

  private notify(result: VerificationResult, action: ProposedAction): void {
    if (!this.dispatcher) return;

    this.dispatcher.dispatch({
      tipo: EVENTO_POR_STATUS[result.status],
      entidade: TipoEntidade.VERIFICACAO,
      entidadeId: result.id,
      timestamp: result.timestamp,
      severidade: result.status === VerificationStatus.APPROVED
        ? NotificationSeverity.INFO
        : NotificationSeverity.WARNING,
      motivo: result.justification,
      urgencia: action.urgency,
      status: result.status,
      dados: {
        actionId: action.id,
        actionType: action.actionType,
        stage: result.stage,
        violatedPillars: [...result.violatedPillars],
        riskScore: result.riskScore
      }
    });
  }
}

export { EthicalGate, EthicalGateContext };
