/**
 * CONFIGURAÇÃO — Ambiente de Execução
 *
 * Tipos, defaults e loader da configuração do núcleo.
 */

import { LogLevel, isLogLevel } from '../utilitarios/Logger';
import { AutonomyLevel, isAutonomyLevel } from '../autonomy/AutonomyTypes';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

interface GuardiaoConfig {
  /** Nível de log (default: 'info') */
  logLevel: LogLevel;

  /** Tabela de pilares (default: './config/circuitos-morais.yaml') */
  pilaresPath: string;

  /** Tabela de níveis (default: './config/niveis-autonomia.yaml') */
  niveisPath: string;

  /** Limite do histórico de verificações (default: 10000) */
  historicoCapacidade: number;

  /** Queda relativa de precisão tolerada na janela de teste (default: 0.05) */
  toleranciaDegradacao: number;

  /** Nível de autonomia no boot (default: 1) */
  nivelInicial: AutonomyLevel;

  /** Arquivo do log de auditoria. Ausente: log apenas em memória */
  eventLogPath?: string;
}

class ConfigError extends Error {
  public readonly code = 'CONFIG_INVALID';

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(`Configuração inválida: ${message}`);
    this.name = 'ConfigError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_CONFIG: GuardiaoConfig = {
  logLevel: 'info',
  pilaresPath: './config/circuitos-morais.yaml',
  niveisPath: './config/niveis-autonomia.yaml',
  historicoCapacidade: 10_000,
  toleranciaDegradacao: 0.05,
  nivelInicial: AutonomyLevel.ASSISTANCE
};

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

function parseNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} deve ser numérico (recebido "${raw}")`, { [name]: raw });
  }
  return value;
}

/**
 * Carrega configuração do ambiente.
 * Variáveis de ambiente:
 * - GUARDIAO_LOG_LEVEL (sob NODE_ENV=test o default é 'silent')
 * - GUARDIAO_PILARES_PATH
 * - GUARDIAO_NIVEIS_PATH
 * - GUARDIAO_HISTORICO_CAPACIDADE
 * - GUARDIAO_TOLERANCIA_DEGRADACAO
 * - GUARDIAO_NIVEL_INICIAL
 * - GUARDIAO_EVENTLOG_PATH
 *
 * @throws ConfigError se algum valor não puder ser interpretado
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardiaoConfig {
  const logLevel = env.GUARDIAO_LOG_LEVEL || (env.NODE_ENV === 'test' ? 'silent' : DEFAULT_CONFIG.logLevel);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`GUARDIAO_LOG_LEVEL desconhecido: ${logLevel}`, { logLevel });
  }

  const nivelInicial = parseNumber(env, 'GUARDIAO_NIVEL_INICIAL', DEFAULT_CONFIG.nivelInicial);
  if (!isAutonomyLevel(nivelInicial)) {
    throw new ConfigError(`GUARDIAO_NIVEL_INICIAL deve estar entre 1 e 5 (recebido ${nivelInicial})`, { nivelInicial });
  }

  const config: GuardiaoConfig = {
    logLevel,
    pilaresPath: env.GUARDIAO_PILARES_PATH || DEFAULT_CONFIG.pilaresPath,
    niveisPath: env.GUARDIAO_NIVEIS_PATH || DEFAULT_CONFIG.niveisPath,
    historicoCapacidade: parseNumber(env, 'GUARDIAO_HISTORICO_CAPACIDADE', DEFAULT_CONFIG.historicoCapacidade),
    toleranciaDegradacao: parseNumber(env, 'GUARDIAO_TOLERANCIA_DEGRADACAO', DEFAULT_CONFIG.toleranciaDegradacao),
    nivelInicial
  };

  if (env.GUARDIAO_EVENTLOG_PATH) {
    config.eventLogPath = env.GUARDIAO_EVENTLOG_PATH;
  }

  validateConfig(config);
  return config;
}

/**
 * Valida a configuração carregada.
 * @throws ConfigError se a configuração for inválida
 */
function validateConfig(config: GuardiaoConfig): void {
  if (!Number.isInteger(config.historicoCapacidade) || config.historicoCapacidade < 1) {
    throw new ConfigError(`historicoCapacidade deve ser inteiro >= 1: ${config.historicoCapacidade}`);
  }

  if (config.toleranciaDegradacao < 0 || config.toleranciaDegradacao > 1) {
    throw new ConfigError(`toleranciaDegradacao deve estar em [0, 1]: ${config.toleranciaDegradacao}`);
  }

  if (!config.pilaresPath) {
    throw new ConfigError('pilaresPath é obrigatório');
  }

  if (!config.niveisPath) {
    throw new ConfigError('niveisPath é obrigatório');
  }

  if (!isAutonomyLevel(config.nivelInicial)) {
    throw new ConfigError(`nivelInicial inválido: ${config.nivelInicial}`);
  }
}

export { GuardiaoConfig, ConfigError, DEFAULT_CONFIG, loadConfig, validateConfig };
