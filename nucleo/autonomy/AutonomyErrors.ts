/**
 * FLUXO DE AUTONOMIA — Erros
 *
 * Erros de validação são valores (FlowResult), nunca lançados pelo fluxo.
 * LevelTableError é lançado apenas na carga da tabela de níveis.
 */

import { TransitionRecord } from './AutonomyTypes';

// ════════════════════════════════════════════════════════════════════════════
// ERRO BASE
// ════════════════════════════════════════════════════════════════════════════

class AutonomyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AutonomyError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS ESPECÍFICOS
// ════════════════════════════════════════════════════════════════════════════

const AutonomyErrorCode = {
  ORIGIN_MISMATCH: 'ORIGIN_MISMATCH',
  INVALID_LEVEL_DELTA: 'INVALID_LEVEL_DELTA',
  ADVANCEMENT_IN_PROGRESS: 'ADVANCEMENT_IN_PROGRESS',
  TRANSITION_NOT_FOUND: 'TRANSITION_NOT_FOUND',
  INVALID_TRANSITION_STATE: 'INVALID_TRANSITION_STATE',
  TEST_WINDOW_OPEN: 'TEST_WINDOW_OPEN'
} as const;

type AutonomyErrorCodeType = typeof AutonomyErrorCode[keyof typeof AutonomyErrorCode];

/**
 * Pedido inválido do chamador. Sempre devolvido de forma síncrona
 * (ou no resultado da promise), nunca repetido automaticamente.
 */
class AutonomyValidationError extends AutonomyError {
  constructor(
    public readonly validationCode: AutonomyErrorCodeType,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, validationCode, details);
    this.name = 'AutonomyValidationError';
  }
}

/**
 * Tabela de níveis inválida. Impede o boot.
 */
class LevelTableError extends AutonomyError {
  constructor(motivo: string, details?: Record<string, unknown>) {
    super(`Tabela de níveis inválida: ${motivo}`, 'LEVEL_TABLE_INVALID', details);
    this.name = 'LevelTableError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// RESULTADO
// ════════════════════════════════════════════════════════════════════════════

type FlowResult<T = TransitionRecord> =
  | { ok: true; value: T }
  | { ok: false; error: AutonomyValidationError };

function success<T>(value: T): FlowResult<T> {
  return { ok: true, value };
}

function failure<T>(
  code: AutonomyErrorCodeType,
  message: string,
  details?: Record<string, unknown>
): FlowResult<T> {
  return { ok: false, error: new AutonomyValidationError(code, message, details) };
}

export {
  AutonomyError,
  AutonomyErrorCode,
  AutonomyErrorCodeType,
  AutonomyValidationError,
  LevelTableError,
  FlowResult,
  success,
  failure
};
