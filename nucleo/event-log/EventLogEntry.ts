// ════════════════════════════════════════════════════════════════════════
// LOG DE AUDITORIA: MODELO DO EVENTO (CANÔNICO)
// ════════════════════════════════════════════════════════════════════════

/**
 * ActorId - Identificador do ator que originou o evento.
 *
 * Valores conhecidos:
 * - 'Guardiao': o próprio núcleo (gate ético, fluxo de autonomia)
 * - Outros: operadores humanos ou sistemas de governança
 */
type ActorId = string;

const SYSTEM_ACTOR: ActorId = 'Guardiao';

/**
 * EventLogEntry - Registro imutável de evento no log encadeado.
 *
 * PRINCÍPIOS:
 * - Append-only
 * - Nunca atualizar, nunca deletar
 *
 * O hash encadeado garante que qualquer alteração retroativa
 * quebra a cadeia de verificação.
 */
interface EventLogEntry {
  id: string;

  timestamp: Date;

  actor: ActorId;

  /** Tipo do evento (ver TipoEvento) */
  evento: string;

  /** Tipo da entidade afetada */
  entidade: string;

  entidade_id: string;

  /** Hash SHA-256 do payload no momento do evento */
  payload_hash: string;

  /** Hash do evento anterior (null apenas no genesis) */
  previous_hash: string | null;

  /** Hash deste evento (calculado a partir dos campos acima) */
  current_hash: string;
}

/**
 * Tipos de eventos registrados.
 */
enum TipoEvento {
  // Circuitos Morais
  ACAO_APROVADA = 'ACAO_APROVADA',
  ACAO_REJEITADA = 'ACAO_REJEITADA',
  ACAO_ESCALADA_REVISAO = 'ACAO_ESCALADA_REVISAO',
  ACAO_BLOQUEADA_AUTONOMIA = 'ACAO_BLOQUEADA_AUTONOMIA',

  // Fluxo de Autonomia
  TRANSICAO_SOLICITADA = 'TRANSICAO_SOLICITADA',
  TRANSICAO_EM_TESTE = 'TRANSICAO_EM_TESTE',
  TRANSICAO_AGUARDANDO_APROVACAO = 'TRANSICAO_AGUARDANDO_APROVACAO',
  TRANSICAO_APROVADA = 'TRANSICAO_APROVADA',
  TRANSICAO_REJEITADA = 'TRANSICAO_REJEITADA',
  TRANSICAO_CONCLUIDA = 'TRANSICAO_CONCLUIDA',
  NIVEL_REVERTIDO = 'NIVEL_REVERTIDO',

  // Salvaguardas
  SALVAGUARDA_ACIONADA = 'SALVAGUARDA_ACIONADA'
}

/**
 * Tipos de entidades rastreadas.
 */
enum TipoEntidade {
  VERIFICACAO = 'VerificationResult',
  ACAO = 'ProposedAction',
  TRANSICAO = 'TransitionRecord',
  INCIDENTE = 'Incident'
}

/**
 * Resultado da verificação da cadeia de eventos.
 */
interface ChainVerificationResult {
  valid: boolean;

  firstInvalidIndex?: number;

  firstInvalidId?: string;

  reason?: string;

  totalVerified: number;
}

export { ActorId, SYSTEM_ACTOR, EventLogEntry, TipoEvento, TipoEntidade, ChainVerificationResult };
