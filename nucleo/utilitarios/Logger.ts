/**
 * Logger estruturado (JSON) compartilhado pelos serviços do núcleo.
 *
 * Cada serviço recebe um Logger opcional no contexto; quando ausente,
 * cria um filho com o binding `modulo`.
 */

import pino, { Logger, LevelWithSilent } from 'pino';

type LogLevel = LevelWithSilent;

/**
 * Nível padrão: GUARDIAO_LOG_LEVEL, ou 'silent' sob NODE_ENV=test.
 */
function defaultLevel(): LogLevel {
  const fromEnv = process.env.GUARDIAO_LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].includes(value);
}

let rootLogger: Logger | null = null;

/**
 * Logger raiz do processo (criado sob demanda).
 */
function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'guardiao',
      level: defaultLevel(),
      timestamp: pino.stdTimeFunctions.isoTime
    });
  }
  return rootLogger;
}

/**
 * Cria logger para um módulo.
 *
 * @param modulo - Nome do módulo (vai para o campo `modulo` de cada linha)
 * @param level - Sobrescreve o nível do logger raiz
 */
function createLogger(modulo: string, level?: LogLevel): Logger {
  const child = getRootLogger().child({ modulo });
  if (level) {
    child.level = level;
  }
  return child;
}

/**
 * Logger que descarta tudo. Usado em testes.
 */
function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export { Logger, LogLevel, isLogLevel, createLogger, getRootLogger, silentLogger };
