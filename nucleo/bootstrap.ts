/**
 * BOOTSTRAP — Montagem do Guardião
 *
 * Carrega as tabelas estáticas, monta o log de auditoria, o dispatcher de
 * notificações e os serviços, na ordem de dependência:
 *   tabelas → event log → dispatcher → gate ético → fluxo → gate de ações
 *   → salvaguardas
 *
 * Falha de configuração impede o boot (RuleTableError, LevelTableError,
 * ConfigError).
 */

import { Logger, createLogger } from './utilitarios/Logger';
import { GuardiaoConfig, loadConfig, validateConfig } from './configuracao/RuntimeConfig';
import { loadPillarTable } from './configuracao/RuleTableLoader';
import { loadLevelTable } from './configuracao/LevelTableLoader';
import { EventLogRepository } from './event-log/EventLogRepository';
import { EventLogRepositoryImpl } from './event-log/EventLogRepositoryImpl';
import { NotificationSink } from './notificacao/NotificationTypes';
import { NotificationDispatcher } from './notificacao/NotificationDispatcher';
import { EventLogNotificationSink } from './notificacao/EventLogNotificationSink';
import { LoggerNotificationSink } from './notificacao/LoggerNotificationSink';
import { PillarRuleTable } from './etica/EthicsTypes';
import { EthicalGate } from './etica/EthicalGate';
import { LevelTable } from './autonomy/AutonomyTypes';
import { GovernanceAuthority, InMemoryMetricsProvider, MetricsProvider } from './autonomy/AutonomyPorts';
import { AutonomyFlow } from './autonomy/AutonomyFlow';
import { SafeguardService } from './autonomy/AutonomySafeguards';
import { ActionGate } from './orquestrador/ActionGate';

interface GuardiaoOptions {
  /** Default: InMemoryMetricsProvider zerado */
  metricsProvider?: MetricsProvider;

  /** Default: AutoApproveGovernance */
  governance?: GovernanceAuthority;

  /** Sinks adicionais, além do event log e do logger */
  sinks?: NotificationSink[];

  logger?: Logger;
  clock?: () => Date;
}

interface Guardiao {
  config: GuardiaoConfig;
  ruleTable: PillarRuleTable;
  levelTable: LevelTable;
  eventLog: EventLogRepository;
  dispatcher: NotificationDispatcher;
  metricsProvider: MetricsProvider;
  ethicalGate: EthicalGate;
  autonomyFlow: AutonomyFlow;
  actionGate: ActionGate;
  safeguards: SafeguardService;
}

async function createGuardiao(
  config: GuardiaoConfig = loadConfig(),
  options: GuardiaoOptions = {}
): Promise<Guardiao> {
  validateConfig(config);

  const moduleLogger = (modulo: string): Logger =>
    options.logger ? options.logger.child({ modulo }) : createLogger(modulo, config.logLevel);
  const logger = moduleLogger('guardiao');
  const clock = options.clock;

  const [ruleTable, levelTable] = await Promise.all([
    loadPillarTable(config.pilaresPath),
    loadLevelTable(config.niveisPath)
  ]);

  const eventLog = await EventLogRepositoryImpl.create(config.eventLogPath);

  const dispatcher = new NotificationDispatcher(
    [
      new EventLogNotificationSink(eventLog),
      new LoggerNotificationSink(moduleLogger('auditoria')),
      ...(options.sinks ?? [])
    ],
    moduleLogger('notificacao')
  );

  const metricsProvider = options.metricsProvider ?? new InMemoryMetricsProvider();

  const ethicalGate = new EthicalGate({
    ruleTable,
    historyCapacity: config.historicoCapacidade,
    logger: moduleLogger('circuitos-morais'),
    dispatcher,
    clock
  });

  const autonomyFlow = new AutonomyFlow({
    levelTable,
    metricsProvider,
    governance: options.governance,
    initialLevel: config.nivelInicial,
    degradationTolerance: config.toleranciaDegradacao,
    logger: moduleLogger('fluxo-autonomia'),
    dispatcher,
    clock
  });

  const actionGate = new ActionGate({
    ethicalGate,
    autonomyFlow,
    logger: moduleLogger('gate-acoes'),
    dispatcher,
    clock
  });

  const safeguards = new SafeguardService({
    flow: autonomyFlow,
    logger: moduleLogger('salvaguardas'),
    dispatcher,
    clock
  });

  logger.info(
    { nivelInicial: config.nivelInicial, eventLogPath: config.eventLogPath ?? null },
    'Guardião inicializado'
  );

  return {
    config,
    ruleTable,
    levelTable,
    eventLog,
    dispatcher,
    metricsProvider,
    ethicalGate,
    autonomyFlow,
    actionGate,
    safeguards
  };
}

export { Guardiao, GuardiaoOptions, createGuardiao };
