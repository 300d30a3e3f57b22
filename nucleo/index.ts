/**
 * GUARDIÃO DE AUTONOMIA
 *
 * Circuitos Morais (gate ético em três estágios) e Fluxo de Autonomia
 * (cinco níveis, avanço gradual, reversão imediata).
 */

export * from './etica';
export * from './autonomy';
export * from './configuracao';
export * from './event-log';
export * from './notificacao';
export * from './orquestrador';
export { Logger, LogLevel, createLogger, silentLogger } from './utilitarios/Logger';
export { Guardiao, GuardiaoOptions, createGuardiao } from './bootstrap';
