import { computeEventHash, computePayloadHash } from '../utilitarios/HashUtil';
import { JsonFileStore } from '../utilitarios/JsonFileStore';
import { PersistLock } from '../utilitarios/PersistLock';
import { generateId } from '../utilitarios/IdUtil';
import { EventLogRepository } from './EventLogRepository';
import { ActorId, EventLogEntry, ChainVerificationResult } from './EventLogEntry';

// ════════════════════════════════════════════════════════════════════════
// FORMATO EM DISCO
// ════════════════════════════════════════════════════════════════════════

type StoredEventLogEntry = Omit<EventLogEntry, 'timestamp'> & { timestamp: string };

function toStored(entry: EventLogEntry): StoredEventLogEntry {
  return { ...entry, timestamp: entry.timestamp.toISOString() };
}

function fromStored(stored: StoredEventLogEntry): EventLogEntry {
  return { ...stored, timestamp: new Date(stored.timestamp) };
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * Log de auditoria encadeado por hash.
 *
 * Mantém os eventos em memória. Com `filePath`, cada append regrava o
 * arquivo JSON de forma atômica e a cadeia é recarregada no create().
 */
class EventLogRepositoryImpl implements EventLogRepository {
  private entries: EventLogEntry[] = [];
  private lastHash: string | null = null;
  private store?: JsonFileStore<StoredEventLogEntry>;
  private lock = new PersistLock();

  private constructor(filePath?: string) {
    if (filePath) {
      this.store = new JsonFileStore<StoredEventLogEntry>(filePath);
    }
  }

  /**
   * Cria o repositório. Sem filePath, o log vive só em memória.
   */
  static async create(filePath?: string): Promise<EventLogRepositoryImpl> {
    const repo = new EventLogRepositoryImpl(filePath);
    await repo.load();
    return repo;
  }

  private async load(): Promise<void> {
    if (!this.store) return;

    const stored = await this.store.readAll();
    this.entries = stored.map(fromStored);
    this.lastHash = this.entries.length > 0
      ? this.entries[this.entries.length - 1].current_hash
      : null;
  }

  async append(
    actor: ActorId,
    evento: string,
    entidade: string,
    entidadeId: string,
    payload: unknown
  ): Promise<EventLogEntry> {
    return this.lock.run(async () => {
      const timestamp = new Date();
      const payloadHash = computePayloadHash(payload);
      const previousHash = this.lastHash;

      const currentHash = computeEventHash(
        previousHash,
        timestamp,
        actor,
        evento,
        entidade,
        entidadeId,
        payloadHash
      );

      const entry: EventLogEntry = {
        id: generateId('evt'),
        timestamp,
        actor,
        evento,
        entidade,
        entidade_id: entidadeId,
        payload_hash: payloadHash,
        previous_hash: previousHash,
        current_hash: currentHash
      };

      if (this.store) {
        await this.store.writeAll([...this.entries, entry].map(toStored));
      }

      this.entries.push(entry);
      this.lastHash = currentHash;

      return { ...entry };
    });
  }

  async getAll(): Promise<EventLogEntry[]> {
    return this.entries.map(e => ({ ...e }));
  }

  async getById(id: string): Promise<EventLogEntry | null> {
    const found = this.entries.find(e => e.id === id);
    return found ? { ...found } : null;
  }

  async getByEvento(evento: string): Promise<EventLogEntry[]> {
    return this.entries.filter(e => e.evento === evento).map(e => ({ ...e }));
  }

  async getByEntidade(entidade: string, entidadeId?: string): Promise<EventLogEntry[]> {
    return this.entries
      .filter(e => e.entidade === entidade && (entidadeId === undefined || e.entidade_id === entidadeId))
      .map(e => ({ ...e }));
  }

  async count(): Promise<number> {
    return this.entries.length;
  }

  async verifyChain(): Promise<ChainVerificationResult> {
    return verifyEntries(this.entries);
  }
}

// ════════════════════════════════════════════════════════════════════════
// VERIFICAÇÃO DA CADEIA
// ════════════════════════════════════════════════════════════════════════

function verifyEntries(entries: readonly EventLogEntry[]): ChainVerificationResult {
  let previousHash: string | null = null;

  for (let i = 0; i < entries.length; i++) {
    const current = entries[i];

    if (current.previous_hash !== previousHash) {
      return {
        valid: false,
        firstInvalidIndex: i,
        firstInvalidId: current.id,
        reason: i === 0
          ? 'Genesis event must have previous_hash = null'
          : `Chain broken: previous_hash does not match previous event's current_hash`,
        totalVerified: i
      };
    }

    const expectedHash = computeEventHash(
      current.previous_hash,
      current.timestamp,
      current.actor,
      current.evento,
      current.entidade,
      current.entidade_id,
      current.payload_hash
    );

    if (current.current_hash !== expectedHash) {
      return {
        valid: false,
        firstInvalidIndex: i,
        firstInvalidId: current.id,
        reason: `Hash mismatch at index ${i}`,
        totalVerified: i
      };
    }

    previousHash = current.current_hash;
  }

  return { valid: true, totalVerified: entries.length };
}

export { EventLogRepositoryImpl, verifyEntries, StoredEventLogEntry };
