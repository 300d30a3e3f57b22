/**
 * Leitura tipada de valores vindos de YAML desserializado.
 * Cada helper recebe a fábrica do erro do módulo chamador.
 */

type ErrorFactory = (motivo: string) => Error;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, where: string, fail: ErrorFactory): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw fail(`${where} deve ser texto não vazio`);
  }
  return value;
}

function requireNumber(value: unknown, where: string, fail: ErrorFactory): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(`${where} deve ser numérico`);
  }
  return value;
}

function requireInteger(value: unknown, where: string, fail: ErrorFactory): number {
  const n = requireNumber(value, where, fail);
  if (!Number.isInteger(n)) {
    throw fail(`${where} deve ser inteiro`);
  }
  return n;
}

function requireBoolean(value: unknown, where: string, fail: ErrorFactory): boolean {
  if (typeof value !== 'boolean') {
    throw fail(`${where} deve ser booleano`);
  }
  return value;
}

export { ErrorFactory, isRecord, requireString, requireNumber, requireInteger, requireBoolean };
