/**
 * FLUXO DE AUTONOMIA — Colaboradores Externos
 *
 * Interfaces estreitas para o provedor de métricas e a autoridade de
 * governança, mais as implementações em processo.
 */

import { GovernanceDecision, PerformanceMetrics, TransitionRecord } from './AutonomyTypes';

// ════════════════════════════════════════════════════════════════════════════
// MÉTRICAS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Fonte somente-leitura das métricas de desempenho (pull).
 */
interface MetricsProvider {
  getMetrics(): Promise<PerformanceMetrics>;
}

const METRICAS_INICIAIS: PerformanceMetrics = {
  precision: 0,
  falseNegatives: 0,
  daysInOperation: 0,
  incidents: 0,
  ethicsApproved: false
};

/**
 * Métricas mantidas em memória, atualizadas pelo chamador.
 */
class InMemoryMetricsProvider implements MetricsProvider {
  private metrics: PerformanceMetrics;

  constructor(initial: Partial<PerformanceMetrics> = {}) {
    this.metrics = { ...METRICAS_INICIAIS, ...initial };
  }

  async getMetrics(): Promise<PerformanceMetrics> {
    return { ...this.metrics };
  }

  set(metrics: PerformanceMetrics): void {
    this.metrics = { ...metrics };
  }

  update(partial: Partial<PerformanceMetrics>): void {
    this.metrics = { ...this.metrics, ...partial };
  }
}

// ════════════════════════════════════════════════════════════════════════════
// GOVERNANÇA
// ════════════════════════════════════════════════════════════════════════════

/**
 * Autoridade que confirma PENDING_APPROVAL → APPROVED.
 * PENDING significa que a decisão chegará depois via recordApproval().
 */
interface GovernanceAuthority {
  readonly nome: string;
  requestApproval(record: TransitionRecord): Promise<GovernanceDecision>;

  /** Chamado quando o avanço chega a um estado terminal */
  settled?(transitionId: string): void;
}

/**
 * Aprova tudo imediatamente.
 */
class AutoApproveGovernance implements GovernanceAuthority {
  readonly nome = 'auto-aprovacao';

  async requestApproval(): Promise<GovernanceDecision> {
    return 'APPROVED';
  }
}

/**
 * Nunca decide na hora: guarda os pedidos para um humano
 * responder depois.
 */
class ManualGovernance implements GovernanceAuthority {
  readonly nome = 'governanca-manual';
  private readonly requested = new Set<string>();

  async requestApproval(record: TransitionRecord): Promise<GovernanceDecision> {
    this.requested.add(record.id);
    return 'PENDING';
  }

  settled(transitionId: string): void {
    this.requested.delete(transitionId);
  }

  /** Pedidos ainda sem decisão */
  pendingRequests(): string[] {
    return [...this.requested];
  }
}

export {
  MetricsProvider,
  METRICAS_INICIAIS,
  InMemoryMetricsProvider,
  GovernanceAuthority,
  AutoApproveGovernance,
  ManualGovernance
};
