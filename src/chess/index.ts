/**
 * Chess Module
 *
 * Chess engine core with:
 * - Board model with in-place make/unmake and incremental Zobrist hashing
 * - Legal move generation and attack detection
 * - Game state classification (check, mate, stalemate, draws)
 * - Position evaluation (material, positional, structural)
 * - Alpha-beta search with a transposition table
 *
 * @module chess
 */

// Game API
export {
  ChessEngine,
  createChessEngine,
  newGame,
  apply,
  bestMove,
} from './ChessEngine.js';
export type { ChessEngineConfig } from './ChessEngine.js';

// Board Model
export { Position, pieceOf } from './ChessBoard.js';
export type { UndoRecord } from './ChessBoard.js';

// Move Generation
export {
  legalMoves,
  hasLegalMove,
  generatePseudoLegalMoves,
  findLegalMove,
  isSquareAttacked,
  isInCheck,
  moveKey,
  sameMove,
  perft,
  divide,
} from './ChessMoveGen.js';

// Game State
export {
  status,
  isTerminal,
  drawReason,
  isInsufficientMaterial,
  PositionHistory,
  historyOf,
  CapturedSet,
  materialPoints,
  captureBalance,
  FIFTY_MOVE_LIMIT,
  REPETITION_LIMIT,
} from './ChessGameState.js';

// Evaluation
export {
  ChessEvaluator,
  MaterialEvaluator,
  createChessEvaluator,
} from './ChessEvaluator.js';
export type { Evaluator } from './ChessEvaluator.js';

// Search
export {
  ChessSearch,
  createChessSearch,
  minimax,
  MATE_SCORE,
  MATE_THRESHOLD,
} from './ChessSearch.js';

// Zobrist Hashing
export {
  computeZobristHash,
  getZobristKeys,
} from './ChessZobrist.js';

// Notation
export {
  parseFen,
  toFen,
  isValidFen,
  parseCoordinateMove,
  formatCoordinateMove,
  isCoordinateMove,
  toSan,
  parseSan,
  ascii,
  pieceGlyph,
} from './ChessNotation.js';

// Errors
export {
  ChessError,
  IllegalMoveError,
  IncompleteMoveError,
  NoHistoryError,
  GameOverError,
  InvalidFenError,
  InvalidConfigError,
  InvariantError,
} from './errors.js';
export type { ChessErrorCode } from './errors.js';

// Types
export type {
  // Core types
  Color,
  PieceType,
  PromotionType,
  PieceSymbol,
  Square,
  MoveFlag,
  Piece,
  PieceOnBoard,
  MoveInput,
  Move,
  BoardPosition,
  PositionSetup,

  // Game state
  CastlingRights,
  CapturedPieces,
  DrawReason,
  GameStatus,
  ChessState,

  // Evaluation
  PawnStructure,
  EvaluationBreakdown,

  // Search
  TTEntry,
  TTEntryType,
  SearchStats,
  SearchResult,

  // Configuration
  EvaluatorConfig,
  SearchConfig,
  SearchOptions,
} from './types.js';

// Constants and square helpers
export {
  STARTING_FEN,
  PIECE_VALUES,
  MATERIAL_POINTS,
  PIECE_UNICODE,
  FILES,
  RANKS,
  SQUARES,
  PROMOTION_TYPES,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_SEARCH_OPTIONS,
  isSquare,
  squareToIndex,
  indexToSquare,
  opponent,
} from './types.js';
