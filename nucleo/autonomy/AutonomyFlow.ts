/**
 * FLUXO DE AUTONOMIA — Máquina de Estados
 *
 * AVANÇO:
 *   REQUESTED → TESTING           (critérios atendidos)
 *   REQUESTED → REJECTED          (critérios não atendidos, itemizado)
 *   TESTING → PENDING_APPROVAL    (sem degradação ao fim da janela)
 *   TESTING → REJECTED            (degradação, itemizado)
 *   PENDING_APPROVAL → APPROVED → COMPLETED (nível trocado)
 *   PENDING_APPROVAL → REJECTED   (governança recusou)
 *   TESTING | PENDING_APPROVAL → REJECTED ("cancelled")
 *
 * REVERSÃO:
 *   REQUESTED → APPROVED → COMPLETED, na mesma chamada, sem teste.
 *   Um avanço ativo é cancelado. Avanços concluídos acima do novo
 *   nível passam a REVERTED.
 *
 * PRINCÍPIOS:
 * - Estado mutável apenas aqui (nível atual e transições)
 * - Pedidos de avanço serializados por PersistLock
 * - Fim da janela de teste e aprovação são disparados externamente
 * - Erros de validação voltam como FlowResult, nunca como exceção
 */

import { Logger, createLogger } from '../utilitarios/Logger';
import { PersistLock } from '../utilitarios/PersistLock';
import { generateId } from '../utilitarios/IdUtil';
import { TipoEvento, TipoEntidade } from '../event-log/EventLogEntry';
import { NotificationDispatcher } from '../notificacao/NotificationDispatcher';
import { NotificationSeverity } from '../notificacao/NotificationTypes';
import {
  ActionCategory,
  AdvancementRequest,
  AutonomyLevel,
  ExternalDecision,
  GovernanceDecision,
  LevelTable,
  MAX_LEVEL,
  MIN_LEVEL,
  PermissionMap,
  PerformanceMetrics,
  ReversionRequest,
  TERMINAL_STATES,
  TransitionRecord,
  TransitionState,
  TransitionType,
  isAutonomyLevel
} from './AutonomyTypes';
import { AutonomyErrorCode, FlowResult, failure, success } from './AutonomyErrors';
import { GovernanceAuthority, MetricsProvider, AutoApproveGovernance } from './AutonomyPorts';
import {
  TOLERANCIA_DEGRADACAO_PADRAO,
  allPassed,
  anyDegraded,
  describeDegradation,
  describeFailedChecks,
  evaluateAdvancementCriteria,
  evaluateDegradation
} from './AutonomyCriteria';
import { addDays, isAfterOrEqual } from './AutonomyTime';

// ════════════════════════════════════════════════════════════════════════════
// CONTEXTO
// ════════════════════════════════════════════════════════════════════════════

interface AutonomyFlowContext {
  levelTable: LevelTable;
  metricsProvider: MetricsProvider;

  /** Default: AutoApproveGovernance */
  governance?: GovernanceAuthority;

  /** Default: ASSISTANCE */
  initialLevel?: AutonomyLevel;

  /** Queda relativa de precisão tolerada na janela de teste (default 0.05) */
  degradationTolerance?: number;

  logger?: Logger;
  dispatcher?: NotificationDispatcher;
  clock?: () => Date;
}

const SISTEMA = 'sistema';
const MOTIVO_CANCELAMENTO = 'cancelled';

const EVENTO_POR_ESTADO: Readonly<Record<TransitionState, TipoEvento>> = {
  [TransitionState.REQUESTED]: TipoEvento.TRANSICAO_SOLICITADA,
  [TransitionState.TESTING]: TipoEvento.TRANSICAO_EM_TESTE,
  [TransitionState.PENDING_APPROVAL]: TipoEvento.TRANSICAO_AGUARDANDO_APROVACAO,
  [TransitionState.APPROVED]: TipoEvento.TRANSICAO_APROVADA,
  [TransitionState.REJECTED]: TipoEvento.TRANSICAO_REJEITADA,
  [TransitionState.COMPLETED]: TipoEvento.TRANSICAO_CONCLUIDA,
  [TransitionState.REVERTED]: TipoEvento.NIVEL_REVERTIDO
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Cópia defensiva: chamadores nunca recebem o registro interno.
 */
function cloneRecord(record: TransitionRecord): TransitionRecord {
  const copy: TransitionRecord = {
    ...record,
    stateHistory: record.stateHistory.map(e => ({ ...e }))
  };
  if (record.evidence) copy.evidence = { ...record.evidence };
  if (record.criteriaChecks) copy.criteriaChecks = record.criteriaChecks.map(c => ({ ...c }));
  if (record.baselineMetrics) copy.baselineMetrics = { ...record.baselineMetrics };
  if (record.testWindow) copy.testWindow = { ...record.testWindow };
  if (record.degradationChecks) copy.degradationChecks = record.degradationChecks.map(d => ({ ...d }));
  if (record.approval) copy.approval = { ...record.approval };
  return copy;
}

// ════════════════════════════════════════════════════════════════════════════
// FLUXO
// ════════════════════════════════════════════════════════════════════════════

class AutonomyFlow {
  private level: AutonomyLevel;
  private activeAdvancement: TransitionRecord | null = null;
  private readonly transitions = new Map<string, TransitionRecord>();
  private readonly archived: TransitionRecord[] = [];
  private readonly lock = new PersistLock();

  private readonly levelTable: LevelTable;
  private readonly metricsProvider: MetricsProvider;
  private readonly governance: GovernanceAuthority;
  private readonly tolerance: number;
  private readonly logger: Logger;
  private readonly dispatcher?: NotificationDispatcher;
  private readonly clock: () => Date;

  constructor(context: AutonomyFlowContext) {
    this.levelTable = context.levelTable;
    this.metricsProvider = context.metricsProvider;
    this.governance = context.governance ?? new AutoApproveGovernance();
    this.level = context.initialLevel ?? MIN_LEVEL;
    this.tolerance = context.degradationTolerance ?? TOLERANCIA_DEGRADACAO_PADRAO;
    this.logger = context.logger ?? createLogger('fluxo-autonomia');
    this.dispatcher = context.dispatcher;
    this.clock = context.clock ?? (() => new Date());

    if (!isAutonomyLevel(this.level)) {
      throw new RangeError(`Nível inicial inválido: ${this.level}`);
    }
  }

  // ══════════════════════════════════════════════════════════════════════════
  // CONSULTAS
  // ══════════════════════════════════════════════════════════════════════════

  currentLevel(): AutonomyLevel {
    return this.level;
  }

  currentPermissions(): PermissionMap {
    return { ...this.levelTable.byLevel[this.level].permissions };
  }

  isCategoryAllowed(category: ActionCategory): boolean {
    return this.levelTable.byLevel[this.level].permissions[category];
  }

  /**
   * Categoria de um tipo de ação, pelo mapa da tabela de níveis.
   * null para tipos não mapeados.
   */
  resolveCategory(actionType: string): ActionCategory | null {
    const map = this.levelTable.actionCategories;
    return Object.hasOwn(map, actionType) ? map[actionType] : null;
  }

  getActiveAdvancement(): TransitionRecord | null {
    return this.activeAdvancement ? cloneRecord(this.activeAdvancement) : null;
  }

  getTransition(id: string): TransitionRecord | null {
    const record = this.transitions.get(id);
    return record ? cloneRecord(record) : null;
  }

  /** Transições encerradas, na ordem em que terminaram */
  getHistory(): TransitionRecord[] {
    return this.archived.map(cloneRecord);
  }

  // ══════════════════════════════════════════════════════════════════════════
  // AVANÇO
  // ══════════════════════════════════════════════════════════════════════════

  /**
   * Solicita avanço de um nível. Critérios são avaliados contra as métricas
   * atuais; se atendidos, a transição entra em TESTING.
   */
  async requestAdvancement(request: AdvancementRequest): Promise<FlowResult> {
    return this.lock.run(async () => {
      const invalid = this.validateAdvancement(request);
      if (invalid) return invalid;

      const now = this.clock();
      const record = this.createRecord(TransitionType.ADVANCEMENT, request.origin, request.destination, request.requestedBy, now);
      record.justification = request.justification;
      if (request.evidence) record.evidence = { ...request.evidence };

      this.activeAdvancement = record;
      this.register(record, `Avanço ${request.origin} → ${request.destination} solicitado`);

      let metrics: PerformanceMetrics;
      try {
        metrics = await this.metricsProvider.getMetrics();
      } catch (error) {
        this.logger.error({ transitionId: record.id, err: error }, 'Falha ao obter métricas');
        if (record.state === TransitionState.REQUESTED) {
          this.reject(record, `Falha ao obter métricas: ${errorMessage(error)}`);
        }
        return success(cloneRecord(record));
      }

      // Uma reversão pode ter cancelado o pedido enquanto as métricas chegavam
      if (record.state !== TransitionState.REQUESTED) {
        return success(cloneRecord(record));
      }

      const criteria = this.levelTable.byLevel[request.origin].advancementCriteria;
      const checks = criteria ? evaluateAdvancementCriteria(criteria, metrics) : [];
      record.criteriaChecks = checks;

      if (!allPassed(checks)) {
        this.reject(record, `Critérios não atendidos: ${describeFailedChecks(checks)}`);
        return success(cloneRecord(record));
      }

      const days = this.levelTable.byLevel[request.destination].testWindowDays ?? 0;
      record.baselineMetrics = { ...metrics };
      record.testWindow = {
        startedAt: now.toISOString(),
        endsAt: addDays(now, days).toISOString(),
        days
      };
      this.changeState(record, TransitionState.TESTING, `Critérios atendidos; janela de teste de ${days} dias`);

      return success(cloneRecord(record));
    });
  }

  /**
   * Encerra a janela de teste. Disparado por um agendador externo.
   */
  async completeTestWindow(transitionId: string, now: Date = this.clock()): Promise<FlowResult> {
    return this.lock.run(async () => {
      const found = this.findInState(transitionId, [TransitionState.TESTING]);
      if (!found.ok) return found;
      const record = found.value;

      const endsAt = new Date(record.testWindow?.endsAt ?? now.toISOString());
      if (!isAfterOrEqual(now, endsAt)) {
        return failure(
          AutonomyErrorCode.TEST_WINDOW_OPEN,
          `Janela de teste de ${transitionId} termina em ${endsAt.toISOString()}`,
          { transitionId, endsAt: endsAt.toISOString() }
        );
      }

      let metrics: PerformanceMetrics;
      try {
        metrics = await this.metricsProvider.getMetrics();
      } catch (error) {
        this.logger.error({ transitionId, err: error }, 'Falha ao obter métricas');
        if (record.state === TransitionState.TESTING) {
          this.reject(record, `Falha ao obter métricas: ${errorMessage(error)}`);
        }
        return success(cloneRecord(record));
      }

      if (record.state !== TransitionState.TESTING) {
        return success(cloneRecord(record));
      }

      const baseline = record.baselineMetrics ?? metrics;
      const ethicsRequired = this.levelTable.byLevel[record.originLevel].advancementCriteria?.ethicsValidationRequired ?? false;
      const deltas = evaluateDegradation(baseline, metrics, this.tolerance, ethicsRequired);
      record.degradationChecks = deltas;

      if (anyDegraded(deltas)) {
        this.reject(record, `Degradação detectada: ${describeDegradation(deltas)}`);
        return success(cloneRecord(record));
      }

      this.changeState(record, TransitionState.PENDING_APPROVAL, 'Janela de teste concluída sem degradação');
      await this.consultGovernance(record);

      return success(cloneRecord(record));
    });
  }

  /**
   * Aplica uma decisão externa de governança a uma transição pendente.
   */
  recordApproval(transitionId: string, decision: ExternalDecision): FlowResult {
    const found = this.findInState(transitionId, [TransitionState.PENDING_APPROVAL]);
    if (!found.ok) return found;
    const record = found.value;

    if (decision.decision === 'APPROVED') {
      this.approve(record, decision.approver, decision.comment);
    } else {
      record.approval = {
        decision: 'REJECTED',
        approver: decision.approver,
        comment: decision.comment,
        decidedAt: this.clock().toISOString()
      };
      this.reject(record, `Rejeitada por ${decision.approver}${decision.comment ? `: ${decision.comment}` : ''}`);
    }

    return success(cloneRecord(record));
  }

  /**
   * Cancela um avanço em teste ou aguardando aprovação.
   */
  cancelAdvancement(transitionId: string, reason?: string): FlowResult {
    const found = this.findInState(transitionId, [TransitionState.TESTING, TransitionState.PENDING_APPROVAL]);
    if (!found.ok) return found;

    const record = found.value;
    this.reject(record, reason ? `${MOTIVO_CANCELAMENTO}: ${reason}` : MOTIVO_CANCELAMENTO);
    return success(cloneRecord(record));
  }

  // ══════════════════════════════════════════════════════════════════════════
  // REVERSÃO
  // ══════════════════════════════════════════════════════════════════════════

  /**
   * Reverte para qualquer nível estritamente inferior. Síncrona: o nível
   * já está trocado quando a chamada retorna.
   */
  requestReversion(request: ReversionRequest): FlowResult {
    if (request.origin !== this.level) {
      return failure(
        AutonomyErrorCode.ORIGIN_MISMATCH,
        `Nível de origem ${request.origin} difere do nível atual ${this.level}`,
        { origin: request.origin, currentLevel: this.level }
      );
    }
    if (!isAutonomyLevel(request.destination) || request.destination >= request.origin) {
      return failure(
        AutonomyErrorCode.INVALID_LEVEL_DELTA,
        `Reversão exige destino inferior ao nível ${request.origin} (recebido ${request.destination})`,
        { origin: request.origin, destination: request.destination }
      );
    }

    const now = this.clock();
    const record = this.createRecord(TransitionType.REVERSION, request.origin, request.destination, request.requestedBy, now);
    record.motive = request.motive;
    record.urgency = request.urgency;

    const active = this.activeAdvancement;
    if (active) {
      record.cancelledAdvancementId = active.id;
      this.reject(active, `${MOTIVO_CANCELAMENTO}: reversão para o nível ${request.destination}`);
    }

    this.register(record, `Reversão ${request.origin} → ${request.destination}: ${request.motive}`);
    this.changeState(record, TransitionState.APPROVED, 'Reversão aprovada sem teste');

    this.level = request.destination;
    this.markRevertedAdvancements(record);
    this.changeState(record, TransitionState.COMPLETED, `Nível revertido para ${request.destination}`);
    this.archive(record);

    this.logger.warn(
      { transitionId: record.id, origin: request.origin, destination: request.destination, urgency: request.urgency },
      `Nível de autonomia revertido: ${request.motive}`
    );

    return success(cloneRecord(record));
  }

  // ══════════════════════════════════════════════════════════════════════════
  // INTERNOS
  // ══════════════════════════════════════════════════════════════════════════

  private validateAdvancement(request: AdvancementRequest): FlowResult | null {
    if (request.origin !== this.level) {
      return failure(
        AutonomyErrorCode.ORIGIN_MISMATCH,
        `Nível de origem ${request.origin} difere do nível atual ${this.level}`,
        { origin: request.origin, currentLevel: this.level }
      );
    }

    if (
      !isAutonomyLevel(request.destination) ||
      request.destination !== request.origin + 1 ||
      request.destination > MAX_LEVEL ||
      !this.levelTable.byLevel[request.origin].advancementCriteria
    ) {
      return failure(
        AutonomyErrorCode.INVALID_LEVEL_DELTA,
        `Avanço deve ser de exatamente um nível: ${request.origin} → ${request.destination} inválido`,
        { origin: request.origin, destination: request.destination }
      );
    }

    if (this.activeAdvancement) {
      const activeId = this.activeAdvancement.id;
      return failure(
        AutonomyErrorCode.ADVANCEMENT_IN_PROGRESS,
        `Já existe avanço ativo: ${activeId}`,
        { activeTransitionId: activeId }
      );
    }

    return null;
  }

  private findInState(id: string, allowed: readonly TransitionState[]): FlowResult {
    const record = this.transitions.get(id);
    if (!record) {
      return failure(AutonomyErrorCode.TRANSITION_NOT_FOUND, `Transição não encontrada: ${id}`, { transitionId: id });
    }
    if (record.type !== TransitionType.ADVANCEMENT || !allowed.includes(record.state)) {
      return failure(
        AutonomyErrorCode.INVALID_TRANSITION_STATE,
        `Transição ${id} está em ${record.state}; esperado ${allowed.join(' ou ')}`,
        { transitionId: id, state: record.state, expected: [...allowed] }
      );
    }
    return success(record);
  }

  private async consultGovernance(record: TransitionRecord): Promise<void> {
    let decision: GovernanceDecision;
    try {
      decision = await this.governance.requestApproval(cloneRecord(record));
    } catch (error) {
      this.logger.error(
        { transitionId: record.id, governanca: this.governance.nome, err: error },
        'Falha ao consultar governança; transição segue aguardando aprovação'
      );
      return;
    }

    if (record.state !== TransitionState.PENDING_APPROVAL) return;

    if (decision === 'APPROVED') {
      this.approve(record, this.governance.nome);
    } else if (decision === 'REJECTED') {
      record.approval = { decision: 'REJECTED', approver: this.governance.nome, decidedAt: this.clock().toISOString() };
      this.reject(record, `Rejeitada por ${this.governance.nome}`);
    }
  }

  private approve(record: TransitionRecord, approver: string, comment?: string): void {
    record.approval = { decision: 'APPROVED', approver, comment, decidedAt: this.clock().toISOString() };
    this.changeState(record, TransitionState.APPROVED, `Aprovada por ${approver}`);

    this.level = record.destinationLevel;
    this.changeState(record, TransitionState.COMPLETED, `Nível alterado para ${record.destinationLevel}`);
    this.archive(record);
  }

  private reject(record: TransitionRecord, reason: string): void {
    record.rejectionReason = reason;
    this.changeState(record, TransitionState.REJECTED, reason);
    this.archive(record);
  }

  /**
   * Avanços concluídos cujo destino ficou acima do novo nível.
   */
  private markRevertedAdvancements(reversion: TransitionRecord): void {
    for (const record of this.archived) {
      if (
        record.type === TransitionType.ADVANCEMENT &&
        record.state === TransitionState.COMPLETED &&
        record.destinationLevel > reversion.destinationLevel
      ) {
        this.changeState(record, TransitionState.REVERTED, `Desfeito pela reversão ${reversion.id}`);
      }
    }
  }

  private createRecord(
    type: TransitionType,
    origin: AutonomyLevel,
    destination: AutonomyLevel,
    requestedBy: string | undefined,
    now: Date
  ): TransitionRecord {
    const ts = now.toISOString();
    return {
      id: generateId(type === TransitionType.ADVANCEMENT ? 'avanco' : 'reversao'),
      type,
      originLevel: origin,
      destinationLevel: destination,
      state: TransitionState.REQUESTED,
      stateHistory: [],
      requestedBy: requestedBy ?? SISTEMA,
      createdAt: ts,
      updatedAt: ts
    };
  }

  private register(record: TransitionRecord, comment: string): void {
    this.transitions.set(record.id, record);
    this.appendState(record, TransitionState.REQUESTED, comment);
  }

  private changeState(record: TransitionRecord, state: TransitionState, comment: string): void {
    record.state = state;
    this.appendState(record, state, comment);
  }

  private appendState(record: TransitionRecord, state: TransitionState, comment: string): void {
    const timestamp = this.clock().toISOString();
    record.stateHistory.push({ state, timestamp, comment });
    record.updatedAt = timestamp;

    this.logger.info(
      { transitionId: record.id, type: record.type, state, origin: record.originLevel, destination: record.destinationLevel },
      comment
    );
    this.notify(record, state, comment, timestamp);
  }

  private archive(record: TransitionRecord): void {
    if (!TERMINAL_STATES.includes(record.state)) return;
    if (this.activeAdvancement === record) {
      this.activeAdvancement = null;
    }
    if (!this.archived.includes(record)) {
      this.archived.push(record);
      if (record.type === TransitionType.ADVANCEMENT) {
        this.governance.settled?.(record.id);
      }
    }
  }

  private notify(record: TransitionRecord, state: TransitionState, comment: string, timestamp: string): void {
    if (!this.dispatcher) return;

    const isReversion = record.type === TransitionType.REVERSION;
    let severidade = NotificationSeverity.INFO;
    if (isReversion) {
      severidade = (record.urgency ?? 0) >= 4 ? NotificationSeverity.CRITICAL : NotificationSeverity.WARNING;
    } else if (state === TransitionState.REJECTED || state === TransitionState.REVERTED) {
      severidade = NotificationSeverity.WARNING;
    }

    this.dispatcher.dispatch({
      tipo: isReversion && state === TransitionState.COMPLETED ? TipoEvento.NIVEL_REVERTIDO : EVENTO_POR_ESTADO[state],
      entidade: TipoEntidade.TRANSICAO,
      entidadeId: record.id,
      timestamp,
      severidade,
      motivo: comment,
      nivelOrigem: record.originLevel,
      nivelDestino: record.destinationLevel,
      urgencia: record.urgency,
      status: state,
      dados: { type: record.type, requestedBy: record.requestedBy }
    });
  }
}

export { AutonomyFlow, AutonomyFlowContext, MOTIVO_CANCELAMENTO };
