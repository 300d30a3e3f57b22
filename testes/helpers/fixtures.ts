/**
 * Fixtures compartilhadas: tabelas reais de config/, relógio controlável,
 * sink que grava notificações e fábrica de ações.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parsePillarTable } from '../../nucleo/configuracao/RuleTableLoader';
import { parseLevelTable } from '../../nucleo/configuracao/LevelTableLoader';
import { PillarRuleTable, ProposedActionInput } from '../../nucleo/etica/EthicsTypes';
import { LevelTable, PerformanceMetrics } from '../../nucleo/autonomy/AutonomyTypes';
import { AutonomyValidationError, FlowResult } from '../../nucleo/autonomy/AutonomyErrors';
import { MetricsProvider } from '../../nucleo/autonomy/AutonomyPorts';
import { NotificationEvent, NotificationSink } from '../../nucleo/notificacao/NotificationTypes';

const CONFIG_DIR = path.join(__dirname, '..', '..', 'config');
const PILARES_PATH = path.join(CONFIG_DIR, 'circuitos-morais.yaml');
const NIVEIS_PATH = path.join(CONFIG_DIR, 'niveis-autonomia.yaml');

function pillarTable(): PillarRuleTable {
  return parsePillarTable(fs.readFileSync(PILARES_PATH, 'utf-8'));
}

function levelTable(): LevelTable {
  return parseLevelTable(fs.readFileSync(NIVEIS_PATH, 'utf-8'));
}

/**
 * Relógio manual: `clock.now` é o instante devolvido por `clock.fn`.
 */
interface ManualClock {
  now: Date;
  fn: () => Date;
  advanceDays(days: number): void;
}

function manualClock(start: string = '2026-01-01T00:00:00.000Z'): ManualClock {
  const clock: ManualClock = {
    now: new Date(start),
    fn: () => clock.now,
    advanceDays(days: number) {
      clock.now = new Date(clock.now.getTime() + days * 24 * 60 * 60 * 1000);
    }
  };
  return clock;
}

class RecordingSink implements NotificationSink {
  readonly nome = 'gravador';
  readonly events: NotificationEvent[] = [];

  notify(event: NotificationEvent): void {
    this.events.push(event);
  }

  tipos(): string[] {
    return this.events.map(e => e.tipo);
  }
}

/**
 * Ação de alocação de recursos sem violações (risco 0).
 */
function allocateResources(overrides: Partial<ProposedActionInput> = {}): ProposedActionInput {
  return {
    actionType: 'allocate_resources',
    estimatedImpact: {
      directHumanImpact: 0.2,
      distributiveImpact: { giniDelta: 0.03 },
      environmentalImpact: { carbon: 800 }
    },
    parameters: { explainability: true, reversible: true },
    urgency: 3,
    justification: 'Redistribuir capacidade ociosa',
    ...overrides
  };
}

/**
 * Métricas que atendem os critérios de qualquer nível.
 */
const METRICAS_BOAS: PerformanceMetrics = {
  precision: 0.995,
  falseNegatives: 0,
  daysInOperation: 200,
  incidents: 0,
  ethicsApproved: true
};

function valueOf<T>(result: FlowResult<T>): T {
  if (!result.ok) {
    throw new Error(`esperado sucesso, recebido ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

function errorOf<T>(result: FlowResult<T>): AutonomyValidationError {
  if (result.ok) {
    throw new Error('esperado erro de validação');
  }
  return result.error;
}

/**
 * Provedor cujas leituras ficam pendentes até `resolve` ou `reject`.
 */
class DeferredMetricsProvider implements MetricsProvider {
  private readonly waiting: Array<{ resolve: (m: PerformanceMetrics) => void; reject: (e: Error) => void }> = [];

  getMetrics(): Promise<PerformanceMetrics> {
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  pending(): number {
    return this.waiting.length;
  }

  resolve(metrics: PerformanceMetrics): void {
    this.waiting.splice(0).forEach(w => w.resolve({ ...metrics }));
  }

  reject(error: Error): void {
    this.waiting.splice(0).forEach(w => w.reject(error));
  }
}

/** Deixa rodar as continuações pendentes */
function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export {
  CONFIG_DIR,
  PILARES_PATH,
  NIVEIS_PATH,
  pillarTable,
  levelTable,
  ManualClock,
  manualClock,
  RecordingSink,
  allocateResources,
  METRICAS_BOAS,
  valueOf,
  errorOf,
  DeferredMetricsProvider,
  nextTick
};
