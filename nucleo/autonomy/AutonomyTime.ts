/**
 * FLUXO DE AUTONOMIA — Helpers de Tempo
 *
 * Funções puras. A janela de teste é medida em dias corridos (UTC).
 */

const MS_POR_DIA = 24 * 60 * 60 * 1000;

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_POR_DIA);
}

function isAfterOrEqual(a: Date, b: Date): boolean {
  return a.getTime() >= b.getTime();
}

export { MS_POR_DIA, addDays, isAfterOrEqual };
