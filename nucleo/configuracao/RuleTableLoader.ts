/**
 * CONFIGURAÇÃO — Tabela de Pilares Éticos
 *
 * Carrega o YAML dos circuitos morais e o converte em PillarRuleTable
 * tipada e congelada.
 *
 * O boot falha (RuleTableError) se:
 * - um pilar falta, se repete ou é desconhecido
 * - as prioridades não formam uma permutação de 1..5
 * - uma regra é desconhecida, repetida ou está sob o pilar errado
 * - uma regra aplicada pelo avaliador está ausente
 */

import * as fs from 'fs/promises';
import { parse } from 'yaml';
import {
  ALL_PILLARS,
  EthicalPillar,
  PillarDefinition,
  PillarRule,
  PillarRuleTable,
  isEthicalPillar
} from '../etica/EthicsTypes';
import { RuleTableError } from '../etica/EthicsErrors';
import { APPLIED_RULE_IDS, KNOWN_RULES } from '../etica/EthicsRules';
import { isRecord, requireString, requireInteger } from './YamlUtil';

// ════════════════════════════════════════════════════════════════════════════
// PARSE DE CADA PILAR
// ════════════════════════════════════════════════════════════════════════════

function parseRule(raw: unknown, pillar: EthicalPillar, index: number): PillarRule {
  const where = `pilares.${pillar}.regras[${index}]`;
  if (!isRecord(raw)) {
    throw new RuleTableError(`${where} deve ser um objeto`);
  }

  const fail = (motivo: string) => new RuleTableError(motivo, { pillar });
  const id = requireString(raw.id, `${where}.id`, fail);
  const description = requireString(raw.descricao, `${where}.descricao`, fail);

  if (!Object.hasOwn(KNOWN_RULES, id)) {
    throw new RuleTableError(`regra desconhecida ${id} em ${pillar}`, { pillar, ruleId: id });
  }
  if (KNOWN_RULES[id] !== pillar) {
    throw new RuleTableError(
      `regra ${id} pertence a ${KNOWN_RULES[id]}, não a ${pillar}`,
      { pillar, ruleId: id, expected: KNOWN_RULES[id] }
    );
  }

  return Object.freeze({ id, description });
}

function parsePillar(raw: unknown, index: number): PillarDefinition {
  const where = `pilares[${index}]`;
  if (!isRecord(raw)) {
    throw new RuleTableError(`${where} deve ser um objeto`);
  }

  const pillar = raw.pilar;
  if (!isEthicalPillar(pillar)) {
    throw new RuleTableError(`pilar desconhecido em ${where}: ${String(pillar)}`, { pillar });
  }

  const fail = (motivo: string) => new RuleTableError(motivo, { pillar });
  const name = requireString(raw.nome, `${where}.nome`, fail);
  const priority = requireInteger(raw.prioridade, `${where}.prioridade`, fail);
  if (priority < 1 || priority > ALL_PILLARS.length) {
    throw new RuleTableError(`prioridade de ${pillar} fora de 1..${ALL_PILLARS.length}: ${priority}`, { pillar, priority });
  }

  if (!Array.isArray(raw.regras)) {
    throw new RuleTableError(`${where}.regras deve ser uma lista`, { pillar });
  }
  const rules = raw.regras.map((r: unknown, i: number) => parseRule(r, pillar, i));

  return Object.freeze({ pillar, name, priority, rules: Object.freeze(rules) });
}

// ════════════════════════════════════════════════════════════════════════════
// TABELA
// ════════════════════════════════════════════════════════════════════════════

/**
 * Valida o conteúdo já desserializado e monta a tabela.
 */
function buildPillarTable(raw: unknown): PillarRuleTable {
  if (!isRecord(raw) || !Array.isArray(raw.pilares)) {
    throw new RuleTableError('esperado objeto com a lista "pilares"');
  }

  const definitions = new Map<EthicalPillar, PillarDefinition>();
  const priorities = new Map<number, EthicalPillar>();
  const ruleOwners = new Map<string, EthicalPillar>();

  raw.pilares.forEach((entry: unknown, index: number) => {
    const def = parsePillar(entry, index);

    if (definitions.has(def.pillar)) {
      throw new RuleTableError(`pilar ${def.pillar} declarado mais de uma vez`, { pillar: def.pillar });
    }

    const samePriority = priorities.get(def.priority);
    if (samePriority) {
      throw new RuleTableError(
        `prioridade ${def.priority} repetida em ${samePriority} e ${def.pillar}`,
        { priority: def.priority }
      );
    }

    for (const rule of def.rules) {
      if (ruleOwners.has(rule.id)) {
        throw new RuleTableError(`regra ${rule.id} declarada mais de uma vez`, { ruleId: rule.id });
      }
      ruleOwners.set(rule.id, def.pillar);
    }

    definitions.set(def.pillar, def);
    priorities.set(def.priority, def.pillar);
  });

  const missingPillars = ALL_PILLARS.filter(p => !definitions.has(p));
  if (missingPillars.length > 0) {
    throw new RuleTableError(`pilares ausentes: ${missingPillars.join(', ')}`, { missing: missingPillars });
  }

  const missingRules = APPLIED_RULE_IDS.filter(id => !ruleOwners.has(id));
  if (missingRules.length > 0) {
    throw new RuleTableError(`regras aplicadas ausentes: ${missingRules.join(', ')}`, { missing: missingRules });
  }

  const definitionOf = (pillar: EthicalPillar): PillarDefinition => {
    const def = definitions.get(pillar);
    if (!def) {
      throw new RuleTableError(`pilar ausente: ${pillar}`, { pillar });
    }
    return def;
  };

  const byPillar: Record<EthicalPillar, PillarDefinition> = {
    [EthicalPillar.PRESERVE_LIFE]: definitionOf(EthicalPillar.PRESERVE_LIFE),
    [EthicalPillar.GLOBAL_EQUITY]: definitionOf(EthicalPillar.GLOBAL_EQUITY),
    [EthicalPillar.RADICAL_TRANSPARENCY]: definitionOf(EthicalPillar.RADICAL_TRANSPARENCY),
    [EthicalPillar.SUSTAINABILITY]: definitionOf(EthicalPillar.SUSTAINABILITY),
    [EthicalPillar.RESIDUAL_HUMAN_CONTROL]: definitionOf(EthicalPillar.RESIDUAL_HUMAN_CONTROL)
  };

  const ordered = [...definitions.values()].sort((a, b) => a.priority - b.priority);

  return Object.freeze({
    byPillar: Object.freeze(byPillar),
    ordered: Object.freeze(ordered)
  });
}

/**
 * Interpreta o texto YAML da tabela.
 */
function parsePillarTable(text: string): PillarRuleTable {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new RuleTableError(`YAML inválido: ${error instanceof Error ? error.message : String(error)}`);
  }
  return buildPillarTable(raw);
}

/**
 * Lê e valida a tabela de pilares do arquivo.
 */
async function loadPillarTable(filePath: string): Promise<PillarRuleTable> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parsePillarTable(text);
}

export { buildPillarTable, parsePillarTable, loadPillarTable };
