import * as crypto from 'crypto';

// ════════════════════════════════════════════════════════════════════════
// UTILITÁRIO DE HASH (SHA-256) PARA O LOG DE AUDITORIA
// ════════════════════════════════════════════════════════════════════════

/**
 * Calcula SHA-256 de uma string.
 */
function sha256(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Calcula o hash encadeado de um evento de auditoria.
 *
 * current_hash = SHA256(
 *   previous_hash | timestamp | actor | evento | entidade | entidade_id | payload_hash
 * )
 */
function computeEventHash(
  previousHash: string | null,
  timestamp: Date,
  actor: string,
  evento: string,
  entidade: string,
  entidadeId: string,
  payloadHash: string
): string {
  const data = [
    previousHash ?? '',
    timestamp.toISOString(),
    actor,
    evento,
    entidade,
    entidadeId,
    payloadHash
  ].join('|');

  return sha256(data);
}

/**
 * Serialização canônica: chaves de objetos ordenadas em todos os níveis.
 */
function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${entries.join(',')}}`;
}

/**
 * Calcula hash do payload de um evento.
 */
function computePayloadHash(payload: unknown): string {
  return sha256(canonicalJson(payload));
}

export { sha256, computeEventHash, computePayloadHash, canonicalJson };
