/**
 * Helper para criação de diretórios de teste isolados.
 *
 * Cada teste recebe seu próprio diretório único, evitando
 * colisão entre suites rodando em paralelo.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

interface TestDataDir {
  /** Caminho absoluto do diretório de teste */
  dir: string;

  /** Remove o diretório recursivamente */
  cleanup: () => Promise<void>;
}

/**
 * Cria um diretório de teste único (fs.mkdtemp) sob o tmp do sistema.
 */
async function createTestDataDir(prefix: string = 'test'): Promise<TestDataDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `guardiao-${prefix}-`));

  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true })
  };
}

export { TestDataDir, createTestDataDir };
