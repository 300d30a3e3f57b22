import * as crypto from 'crypto';

/**
 * Gera ID com prefixo legível (ex: verif_3f2a...).
 */
function generateId(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}`;
}

/**
 * ID de ação proposta: tipo da ação + timestamp (+ sufixo aleatório curto
 * para duas ações do mesmo tipo no mesmo milissegundo).
 */
function generateActionId(actionType: string, now: Date): string {
  const tipo = actionType.trim().length > 0 ? actionType.trim() : 'acao';
  return `${tipo}-${now.getTime()}-${crypto.randomBytes(3).toString('hex')}`;
}

export { generateId, generateActionId };
