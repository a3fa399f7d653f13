/**
 * Chess Module Type Definitions
 *
 * Shared types and constants for the board model, move generator, game state
 * machine and search.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Piece types a pawn may promote to */
export type PromotionType = 'q' | 'r' | 'b' | 'n';

/** Piece symbol (uppercase = white, lowercase = black) */
export type PieceSymbol = 'P' | 'N' | 'B' | 'R' | 'Q' | 'K' | 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

/** Move flags, combined into the `flags` string of a move */
export type MoveFlag =
  | 'n'  // Normal move
  | 'b'  // Pawn push of two squares
  | 'e'  // En passant capture
  | 'c'  // Standard capture
  | 'p'  // Promotion
  | 'k'  // Kingside castling
  | 'q'; // Queenside castling

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  readonly type: PieceType;
  readonly color: Color;
}

/** A piece with its position */
export interface PieceOnBoard extends Piece {
  square: Square;
}

// =============================================================================
// Move Representation
// =============================================================================

/** Input format for naming a move */
export interface MoveInput {
  from: Square;
  to: Square;
  promotion?: PieceType;
}

/** Fully resolved move produced by the move generator */
export interface Move {
  /** Source square */
  readonly from: Square;
  /** Target square */
  readonly to: Square;
  /** Piece type that moved */
  readonly piece: PieceType;
  /** Color of the player who made the move */
  readonly color: Color;
  /** Piece type captured (if any, including en passant) */
  readonly captured?: PieceType;
  /** Piece type promoted to (if pawn promotion) */
  readonly promotion?: PromotionType;
  /** Concatenated MoveFlag characters, e.g. "n", "b", "cp", "k" */
  readonly flags: string;
}

// =============================================================================
// Game State
// =============================================================================

/** Castling rights */
export interface CastlingRights {
  /** White can castle kingside */
  whiteKingside: boolean;
  /** White can castle queenside */
  whiteQueenside: boolean;
  /** Black can castle kingside */
  blackKingside: boolean;
  /** Black can castle queenside */
  blackQueenside: boolean;
}

/**
 * Captured pieces tracking, keyed by the color of the pieces that were
 * removed from the board
 */
export interface CapturedPieces {
  white: Piece[];  // White's pieces taken by black
  black: Piece[];  // Black's pieces taken by white
}

/** Draw reasons the state machine can detect */
export type DrawReason = 'fifty_move' | 'insufficient_material' | 'repetition';

/** Classification of a position */
export type GameStatus =
  | { kind: 'ongoing' }
  | { kind: 'check'; side: Color }
  | { kind: 'checkmate'; winner: Color }
  | { kind: 'stalemate' }
  | { kind: 'draw'; reason: DrawReason };

/** Read-only view of a position used for hashing */
export interface BoardPosition {
  readonly turn: Color;
  readonly castling: Readonly<CastlingRights>;
  readonly enPassant: Square | null;
  pieceAtIndex(index: number): Piece | null;
}

/** Raw position data, as produced by FEN parsing */
export interface PositionSetup {
  /** 64 entries, index = rank * 8 + file (a1 = 0, h8 = 63) */
  squares: (Piece | null)[];
  turn: Color;
  castling: CastlingRights;
  enPassant: Square | null;
  halfMoveClock: number;
  fullMoveNumber: number;
}

/** Game state snapshot for external collaborators (UI, persistence) */
export interface ChessState {
  /** Current FEN string */
  fen: string;
  /** Current turn */
  turn: Color;
  /** Full move number */
  moveNumber: number;
  /** Half-move clock (for 50-move rule) */
  halfMoveClock: number;
  /** Classification of the current position */
  status: GameStatus;
  /** Is the game over */
  isGameOver: boolean;
  /** Legal moves in coordinate notation */
  legalMoves: string[];
  /** Last move played */
  lastMove: Move | null;
  /** Move history in SAN notation */
  history: string[];
  /** Captured pieces */
  capturedPieces: CapturedPieces;
  /** Castling rights */
  castling: CastlingRights;
  /** En passant target square */
  enPassant: Square | null;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Pawn structure analysis */
export interface PawnStructure {
  /** Number of doubled pawns */
  doubled: number;
  /** Number of isolated pawns */
  isolated: number;
  /** Number of passed pawns */
  passed: number;
  /** Number of connected pawn pairs */
  connected: number;
  /** Pawn islands count */
  islands: number;
}

/** Position evaluation breakdown */
export interface EvaluationBreakdown {
  material: number;
  pieceSquares: number;
  pawnStructure: number;
  mobility: number;
  kingSafety: number;
  centerControl: number;
  bishopPair: number;
  rookOpenFile: number;
  /** Total evaluation */
  total: number;
  /** Game phase (0 = endgame, 256 = opening) */
  gamePhase: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Transposition table entry type */
export type TTEntryType = 'EXACT' | 'LOWER' | 'UPPER';

/**
 * Transposition table entry
 * Uses BigInt for proper 64-bit Zobrist hashing
 */
export interface TTEntry {
  /** Position hash (64-bit Zobrist key) */
  hash: bigint;
  /** Remaining depth the score was searched to */
  depth: number;
  /** Score, side-to-move perspective, mate scores stored relative to this node */
  score: number;
  /** Entry type (exact, lower bound, upper bound) */
  type: TTEntryType;
  /** Best move found */
  bestMove: Move | null;
  /** Age (for replacement strategy) */
  age: number;
}

/** Search statistics */
export interface SearchStats {
  /** Total nodes searched */
  nodes: number;
  /** Depth reached */
  depth: number;
  /** Search time in milliseconds */
  time: number;
  /** Nodes per second */
  nps: number;
  /** Transposition table hits */
  ttHits: number;
  /** Transposition table cutoffs */
  ttCutoffs: number;
  /** Beta cutoffs */
  betaCutoffs: number;
}

/** Search result */
export interface SearchResult {
  /** Best move */
  bestMove: Move;
  /** Score in centipawns from the side to move's perspective */
  score: number;
  /** Search depth completed */
  depth: number;
  /** Nodes searched */
  nodes: number;
  /** Search time in ms */
  time: number;
  /** Principal variation (best line) */
  pv: Move[];
  /** Whether the budget cut the search short */
  aborted: boolean;
  /** Transposition table hits */
  ttHits: number;
  /** Hash table fill (per mille) */
  hashFull: number;
  /** Nodes per second */
  nps: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

/** Per-call search budget */
export interface SearchConfig {
  /** Maximum search depth in plies */
  maxDepth: number;
  /** Time limit in ms */
  timeLimit?: number;
  /** Node limit */
  nodeLimit?: number;
}

/** Search engine tuning */
export interface SearchOptions {
  /** Use transposition table */
  useTranspositionTable: boolean;
  /** Transposition table size in MB */
  ttSizeMB: number;
  /** Order moves (hash move, captures, killers, history) */
  useMoveOrdering: boolean;
  /** Use killer move heuristic */
  useKillerMoves: boolean;
  /** Use history heuristic */
  useHistoryHeuristic: boolean;
  /** Log each completed iteration */
  verbose: boolean;
}

/** Chess evaluator configuration */
export interface EvaluatorConfig {
  /** Evaluate king safety */
  evaluateKingSafety?: boolean;
  /** Evaluate pawn structure */
  evaluatePawnStructure?: boolean;
  /** Evaluate piece mobility */
  evaluateMobility?: boolean;
  /** Custom piece values (centipawns) */
  pieceValues?: {
    pawn: number;
    knight: number;
    bishop: number;
    rook: number;
    queen: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 20000,
};

/** Point values for captured-material display */
export const MATERIAL_POINTS: Record<PieceType, number> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  k: 0,
};

/** Unicode chess piece symbols */
export const PIECE_UNICODE: Record<PieceSymbol, string> = {
  K: '♔', Q: '♕', R: '♖', B: '♗', N: '♘', P: '♙',
  k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟',
};

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** All squares, in index order (a1, b1, ... h1, a2, ... h8) */
export const SQUARES: readonly Square[] = RANKS.flatMap(r => FILES.map(f => toSquare(f, r)));

const SQUARE_INDEX = new Map<string, number>(SQUARES.map((sq, i) => [sq, i]));

export const PROMOTION_TYPES: readonly PromotionType[] = ['q', 'r', 'b', 'n'];

/** Default search tuning */
export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  useTranspositionTable: true,
  ttSizeMB: 16,
  useMoveOrdering: true,
  useKillerMoves: true,
  useHistoryHeuristic: true,
  verbose: false,
};

/** Default search budget */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxDepth: 4,
};

// =============================================================================
// Square helpers
// =============================================================================

function toSquare(file: typeof FILES[number], rank: typeof RANKS[number]): Square {
  return `${file}${rank}`;
}

/** Type guard for algebraic squares */
export function isSquare(value: string): value is Square {
  return SQUARE_INDEX.has(value);
}

/**
 * Convert algebraic square to index (0-63)
 * a1=0, b1=1, ... h1=7, a2=8, ... h8=63
 */
export function squareToIndex(square: Square): number {
  const index = SQUARE_INDEX.get(square);
  if (index === undefined) {
    throw new RangeError(`Not a square: ${square}`);
  }
  return index;
}

/** Convert index (0-63) to algebraic square */
export function indexToSquare(index: number): Square {
  const square = SQUARES[index];
  if (square === undefined) {
    throw new RangeError(`Square index out of range: ${index}`);
  }
  return square;
}

export function fileOf(index: number): number {
  return index & 7;
}

export function rankOf(index: number): number {
  return index >> 3;
}

export function opponent(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
