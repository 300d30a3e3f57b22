import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Store genérico para persistência em arquivo JSON
 * - Escrita atômica (via .tmp + rename)
 * - Controle de concorrência via fila interna
 * - Leitura com recuperação de .tmp (crash entre write e rename)
 */
class JsonFileStore<T> {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private filePath: string) {}

  /**
   * Lê todos os itens do arquivo.
   * Retorna array vazio se o arquivo não existe.
   */
  async readAll(): Promise<T[]> {
    const tmpPath = this.filePath + '.tmp';

    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      return parseArray<T>(raw, this.filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    // Arquivo principal não existe: recuperar de .tmp se houver
    const tmpExists = await fs.access(tmpPath).then(() => true, () => false);
    if (!tmpExists) {
      return [];
    }
    await fs.rename(tmpPath, this.filePath);
    const raw = await fs.readFile(this.filePath, 'utf-8');
    return parseArray<T>(raw, this.filePath);
  }

  /**
   * Escreve todos os itens no arquivo (substitui o conteúdo).
   * Um erro de escrita anterior não envenena a fila.
   */
  async writeAll(items: T[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = this.filePath + '.tmp';

    const next = this.writeChain.catch(() => undefined).then(async () => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(items, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    });
    this.writeChain = next;

    return next;
  }
}

/** Checagem estrutural: o erro pode vir de outro realm */
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function parseArray<T>(raw: string, filePath: string): T[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`Conteúdo inválido em ${filePath}: esperado array JSON`);
  }
  return parsed;
}

export { JsonFileStore, isNotFound };
