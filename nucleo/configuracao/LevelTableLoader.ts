/**
 * CONFIGURAÇÃO — Tabela de Níveis de Autonomia
 *
 * Carrega o YAML dos níveis: permissões, critérios de avanço, janela de
 * teste e o mapa tipo de ação → categoria.
 *
 * O boot falha (LevelTableError) se:
 * - algum nível 1..5 falta ou se repete
 * - o nome não corresponde ao AutonomyLevel
 * - níveis 1..4 não têm critérios, ou o nível 5 tem
 * - níveis 2..5 não têm janela de teste positiva
 * - as permissões não cobrem as quatro categorias
 * - o mapa de categorias usa categoria desconhecida
 */

import * as fs from 'fs/promises';
import { parse } from 'yaml';
import {
  ALL_CATEGORIES,
  ALL_LEVELS,
  ActionCategory,
  AdvancementCriteria,
  AutonomyLevel,
  LevelDefinition,
  LevelTable,
  MAX_LEVEL,
  MIN_LEVEL,
  PermissionMap,
  isActionCategory,
  isAutonomyLevel
} from '../autonomy/AutonomyTypes';
import { LevelTableError } from '../autonomy/AutonomyErrors';
import { isRecord, requireBoolean, requireInteger, requireNumber, requireString } from './YamlUtil';

const fail = (motivo: string) => new LevelTableError(motivo);

// ════════════════════════════════════════════════════════════════════════════
// PARSE DE CADA NÍVEL
// ════════════════════════════════════════════════════════════════════════════

function parsePermissions(raw: unknown, where: string): PermissionMap {
  if (!isRecord(raw)) {
    throw fail(`${where} deve ser um objeto`);
  }

  for (const key of Object.keys(raw)) {
    if (!isActionCategory(key)) {
      throw new LevelTableError(`${where}: categoria desconhecida ${key}`, { category: key });
    }
  }

  return Object.freeze({
    hotfix: requireBoolean(raw.hotfix, `${where}.hotfix`, fail),
    refactor: requireBoolean(raw.refactor, `${where}.refactor`, fail),
    redesign: requireBoolean(raw.redesign, `${where}.redesign`, fail),
    evolution: requireBoolean(raw.evolution, `${where}.evolution`, fail)
  });
}

function parseCriteria(raw: unknown, where: string): AdvancementCriteria {
  if (!isRecord(raw)) {
    throw fail(`${where} deve ser um objeto`);
  }

  const minPrecision = requireNumber(raw.precisao_minima, `${where}.precisao_minima`, fail);
  if (minPrecision < 0 || minPrecision > 1) {
    throw fail(`${where}.precisao_minima deve estar em [0, 1]`);
  }

  return Object.freeze({
    minPrecision,
    maxFalseNegatives: requireInteger(raw.falsos_negativos_maximos, `${where}.falsos_negativos_maximos`, fail),
    minDaysInOperation: requireInteger(raw.dias_operacao_minimos, `${where}.dias_operacao_minimos`, fail),
    maxIncidents: requireInteger(raw.incidentes_maximos, `${where}.incidentes_maximos`, fail),
    ethicsValidationRequired: requireBoolean(raw.validacao_etica_obrigatoria, `${where}.validacao_etica_obrigatoria`, fail)
  });
}

function parseLevel(raw: unknown, index: number): LevelDefinition {
  const where = `niveis[${index}]`;
  if (!isRecord(raw)) {
    throw fail(`${where} deve ser um objeto`);
  }

  const level = raw.nivel;
  if (!isAutonomyLevel(level)) {
    throw new LevelTableError(`${where}.nivel deve estar entre 1 e 5 (recebido ${String(level)})`, { level });
  }

  const name = requireString(raw.nome, `${where}.nome`, fail);
  if (name !== AutonomyLevel[level]) {
    throw new LevelTableError(`nível ${level} deve se chamar ${AutonomyLevel[level]} (recebido ${name})`, { level, name });
  }

  const definition: LevelDefinition = {
    level,
    name,
    permissions: parsePermissions(raw.permissoes, `${where}.permissoes`)
  };

  if (level < MAX_LEVEL) {
    definition.advancementCriteria = parseCriteria(raw.criterios_avanco, `${where}.criterios_avanco`);
  } else if (raw.criterios_avanco !== undefined) {
    throw new LevelTableError(`nível ${MAX_LEVEL} não tem critérios de avanço`, { level });
  }

  if (level > MIN_LEVEL) {
    const days = requireInteger(raw.janela_teste_dias, `${where}.janela_teste_dias`, fail);
    if (days <= 0) {
      throw new LevelTableError(`${where}.janela_teste_dias deve ser positivo`, { level, days });
    }
    definition.testWindowDays = days;
  }

  return Object.freeze(definition);
}

function parseCategories(raw: unknown): Record<string, ActionCategory> {
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw fail('categorias_acao deve ser um objeto');
  }

  const categories: Record<string, ActionCategory> = {};
  for (const [actionType, category] of Object.entries(raw)) {
    if (!isActionCategory(category)) {
      throw new LevelTableError(
        `categorias_acao.${actionType}: categoria desconhecida ${String(category)} (esperado ${ALL_CATEGORIES.join(', ')})`,
        { actionType, category }
      );
    }
    categories[actionType] = category;
  }
  return categories;
}

// ════════════════════════════════════════════════════════════════════════════
// TABELA
// ════════════════════════════════════════════════════════════════════════════

function buildLevelTable(raw: unknown): LevelTable {
  if (!isRecord(raw) || !Array.isArray(raw.niveis)) {
    throw fail('esperado objeto com a lista "niveis"');
  }

  const definitions = new Map<AutonomyLevel, LevelDefinition>();
  raw.niveis.forEach((entry: unknown, index: number) => {
    const def = parseLevel(entry, index);
    if (definitions.has(def.level)) {
      throw new LevelTableError(`nível ${def.level} declarado mais de uma vez`, { level: def.level });
    }
    definitions.set(def.level, def);
  });

  const missing = ALL_LEVELS.filter(l => !definitions.has(l));
  if (missing.length > 0) {
    throw new LevelTableError(`níveis ausentes: ${missing.join(', ')}`, { missing });
  }

  const definitionOf = (level: AutonomyLevel): LevelDefinition => {
    const def = definitions.get(level);
    if (!def) {
      throw new LevelTableError(`nível ausente: ${level}`, { level });
    }
    return def;
  };

  const byLevel: Record<AutonomyLevel, LevelDefinition> = {
    [AutonomyLevel.ASSISTANCE]: definitionOf(AutonomyLevel.ASSISTANCE),
    [AutonomyLevel.SUPERVISED]: definitionOf(AutonomyLevel.SUPERVISED),
    [AutonomyLevel.CONDITIONAL]: definitionOf(AutonomyLevel.CONDITIONAL),
    [AutonomyLevel.HIGH]: definitionOf(AutonomyLevel.HIGH),
    [AutonomyLevel.FULL]: definitionOf(AutonomyLevel.FULL)
  };

  return Object.freeze({
    byLevel: Object.freeze(byLevel),
    actionCategories: Object.freeze(parseCategories(raw.categorias_acao))
  });
}

function parseLevelTable(text: string): LevelTable {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new LevelTableError(`YAML inválido: ${error instanceof Error ? error.message : String(error)}`);
  }
  return buildLevelTable(raw);
}

async function loadLevelTable(filePath: string): Promise<LevelTable> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseLevelTable(text);
}

export { buildLevelTable, parseLevelTable, loadLevelTable };
