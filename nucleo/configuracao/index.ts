/**
 * CONFIGURAÇÃO
 *
 * Barrel export: ambiente de execução e tabelas estáticas (YAML).
 */

export { GuardiaoConfig, ConfigError, DEFAULT_CONFIG, loadConfig, validateConfig } from './RuntimeConfig';
export { buildPillarTable, parsePillarTable, loadPillarTable } from './RuleTableLoader';
export { buildLevelTable, parseLevelTable, loadLevelTable } from './LevelTableLoader';
