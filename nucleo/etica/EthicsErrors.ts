/**
 * CIRCUITOS MORAIS — Erros
 *
 * A verificação em si nunca lança: payloads malformados recebem defaults.
 * Estes erros cobrem apenas falhas de carga da tabela de regras.
 */

// ════════════════════════════════════════════════════════════════════════════
// ERRO BASE
// ════════════════════════════════════════════════════════════════════════════

class EthicsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EthicsError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS ESPECÍFICOS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Tabela de pilares inválida. Impede o boot.
 */
class RuleTableError extends EthicsError {
  constructor(motivo: string, details?: Record<string, unknown>) {
    super(`Tabela de pilares inválida: ${motivo}`, 'RULE_TABLE_INVALID', details);
    this.name = 'RuleTableError';
  }
}

export { EthicsError, RuleTableError };
