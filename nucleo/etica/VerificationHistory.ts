/**
 * CIRCUITOS MORAIS — Histórico de Verificações
 *
 * Registro em memória indexado pelo id da verificação.
 * Append-only com limite de capacidade: ao exceder, descarta o mais antigo.
 *
 * As estatísticas são cumulativas desde a criação e não diminuem
 * quando um registro é descartado.
 */

import {
  EthicalPillar,
  NormalizedImpact,
  ProposedAction,
  VerificationResult,
  VerificationStatistics,
  VerificationStatus
} from './EthicsTypes';

/**
 * Entrada do histórico: o veredito, a ação avaliada e o impacto
 * normalizado visto pelas regras (usado pela explicação).
 */
interface VerificationRecord {
  result: VerificationResult;
  action: ProposedAction;
  impact: NormalizedImpact;
}

const DEFAULT_HISTORY_CAPACITY = 10_000;

function cloneResult(result: VerificationResult): VerificationResult {
  return {
    ...result,
    violatedPillars: [...result.violatedPillars],
    findings: result.findings.map(f => ({ ...f })),
    suggestedAlternatives: result.suggestedAlternatives.map(a => ({ ...a, overrides: { ...a.overrides } }))
  };
}

function emptyPillarCounts(): Record<EthicalPillar, number> {
  return {
    [EthicalPillar.PRESERVE_LIFE]: 0,
    [EthicalPillar.GLOBAL_EQUITY]: 0,
    [EthicalPillar.RADICAL_TRANSPARENCY]: 0,
    [EthicalPillar.SUSTAINABILITY]: 0,
    [EthicalPillar.RESIDUAL_HUMAN_CONTROL]: 0
  };
}

class VerificationHistory {
  private readonly records = new Map<string, VerificationRecord>();
  private readonly capacity: number;
  private evicted = 0;
  private total = 0;
  private readonly byStatus: Record<VerificationStatus, number> = {
    [VerificationStatus.APPROVED]: 0,
    [VerificationStatus.REJECTED]: 0,
    [VerificationStatus.NEEDS_REVIEW]: 0
  };
  private readonly violationsByPillar = emptyPillarCounts();

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Capacidade do histórico deve ser inteiro >= 1 (recebido ${capacity})`);
    }
    this.capacity = capacity;
  }

  add(record: VerificationRecord): void {
    this.records.set(record.result.id, {
      ...record,
      result: cloneResult(record.result)
    });

    this.total++;
    this.byStatus[record.result.status]++;
    for (const pillar of record.result.violatedPillars) {
      this.violationsByPillar[pillar]++;
    }

    while (this.records.size > this.capacity) {
      const oldest = this.records.keys().next();
      if (oldest.done) break;
      this.records.delete(oldest.value);
      this.evicted++;
    }
  }

  get(id: string): VerificationRecord | null {
    const record = this.records.get(id);
    if (!record) return null;
    return { ...record, result: cloneResult(record.result) };
  }

  /** Resultados retidos, do mais antigo ao mais recente */
  list(): VerificationResult[] {
    return [...this.records.values()].map(r => cloneResult(r.result));
  }

  statistics(): VerificationStatistics {
    return {
      total: this.total,
      byStatus: { ...this.byStatus },
      violationsByPillar: { ...this.violationsByPillar },
      evicted: this.evicted
    };
  }
}

export { VerificationHistory, VerificationRecord, DEFAULT_HISTORY_CAPACITY, cloneResult };
