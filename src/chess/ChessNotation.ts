/**
 * ChessNotation - Text formats at the edge of the core
 *
 * FEN for positions, coordinate notation ("e2e4", "e7e8q") and SAN
 * ("Nf3", "exd6", "O-O", "e8=Q+") for moves. The core itself only deals in
 * Position and Move values.
 */

import { Position, pieceOf } from './ChessBoard.js';
import type {
  CastlingRights,
  Color,
  Move,
  MoveInput,
  Piece,
  PieceSymbol,
  PieceType,
  PositionSetup,
  PromotionType,
} from './types.js';
import { FILES, PIECE_UNICODE, PROMOTION_TYPES, fileOf, isSquare, rankOf, squareToIndex } from './types.js';
import { isInCheck, hasLegalMove, legalMoves, moveKey } from './ChessMoveGen.js';
import { IllegalMoveError, InvalidFenError, InvariantError } from './errors.js';

// =============================================================================
// FEN
// =============================================================================

const PIECE_TYPES: readonly PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];

function pieceFromChar(ch: string): Piece | null {
  const type = PIECE_TYPES.find(t => t === ch.toLowerCase());
  if (!type) return null;
  return pieceOf(type, ch === ch.toUpperCase() ? 'w' : 'b');
}

function pieceToChar(piece: Piece): PieceSymbol {
  return piece.color === 'w' ? toWhiteSymbol(piece.type) : piece.type;
}

function toWhiteSymbol(type: PieceType): PieceSymbol {
  switch (type) {
    case 'p': return 'P';
    case 'n': return 'N';
    case 'b': return 'B';
    case 'r': return 'R';
    case 'q': return 'Q';
    case 'k': return 'K';
  }
}

function parsePlacement(fen: string, placement: string): (Piece | null)[] {
  const rows = placement.split('/');
  if (rows.length !== 8) {
    throw new InvalidFenError(fen, `expected 8 ranks, got ${rows.length}`);
  }

  const squares = new Array<Piece | null>(64).fill(null);
  rows.forEach((row, i) => {
    const rank = 7 - i;
    let file = 0;
    for (const ch of row) {
      if (ch >= '1' && ch <= '8') {
        file += Number(ch);
        continue;
      }
      const piece = pieceFromChar(ch);
      if (!piece) {
        throw new InvalidFenError(fen, `unknown piece "${ch}"`);
      }
      if (file > 7) {
        throw new InvalidFenError(fen, `rank ${rank + 1} describes more than 8 squares`);
      }
      if (piece.type === 'p' && (rank === 0 || rank === 7)) {
        throw new InvalidFenError(fen, 'pawn on the first or last rank');
      }
      squares[rank * 8 + file] = piece;
      file++;
    }
    if (file !== 8) {
      throw new InvalidFenError(fen, `rank ${rank + 1} does not describe 8 squares`);
    }
  });

  for (const color of ['w', 'b'] as const) {
    const kings = squares.filter(p => p?.type === 'k' && p.color === color).length;
    if (kings !== 1) {
      throw new InvalidFenError(fen, `expected one ${color === 'w' ? 'white' : 'black'} king, found ${kings}`);
    }
  }

  return squares;
}

function parseCastling(fen: string, field: string): CastlingRights {
  if (field === '-') {
    return { whiteKingside: false, whiteQueenside: false, blackKingside: false, blackQueenside: false };
  }
  if (!/^K?Q?k?q?$/.test(field)) {
    throw new InvalidFenError(fen, `bad castling field "${field}"`);
  }
  return {
    whiteKingside: field.includes('K'),
    whiteQueenside: field.includes('Q'),
    blackKingside: field.includes('k'),
    blackQueenside: field.includes('q'),
  };
}

function parseCounter(fen: string, field: string, name: string, min: number): number {
  if (!/^\d+$/.test(field) || Number(field) < min) {
    throw new InvalidFenError(fen, `bad ${name} "${field}"`);
  }
  return Number(field);
}

/**
 * Parse a FEN string into a Position
 * @throws InvalidFenError
 */
export function parseFen(fen: string): Position {
  const parts = fen.trim().split(/\s+/);
  if (parts.length !== 6) {
    throw new InvalidFenError(fen, `expected 6 fields, got ${parts.length}`);
  }
  const [placement, turnField, castlingField, epField, halfField, fullField] = parts;

  if (turnField !== 'w' && turnField !== 'b') {
    throw new InvalidFenError(fen, `bad side to move "${turnField}"`);
  }
  const turn: Color = turnField;

  let enPassant: PositionSetup['enPassant'] = null;
  if (epField !== '-') {
    if (!isSquare(epField) || epField[1] !== (turn === 'w' ? '6' : '3')) {
      throw new InvalidFenError(fen, `bad en passant square "${epField}"`);
    }
    enPassant = epField;
  }

  const setup: PositionSetup = {
    squares: parsePlacement(fen, placement),
    turn,
    castling: parseCastling(fen, castlingField),
    enPassant,
    halfMoveClock: parseCounter(fen, halfField, 'half-move clock', 0),
    fullMoveNumber: parseCounter(fen, fullField, 'full-move number', 1),
  };

  try {
    return Position.fromSetup(setup);
  } catch (err) {
    if (err instanceof InvariantError) {
      throw new InvalidFenError(fen, err.message);
    }
    throw err;
  }
}

/**
 * Serialize a Position to FEN
 */
export function toFen(position: Position): string {
  const rows: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < 8; file++) {
      const piece = position.pieceAtIndex(rank * 8 + file);
      if (!piece) {
        empty++;
        continue;
      }
      if (empty > 0) {
        row += empty;
        empty = 0;
      }
      row += pieceToChar(piece);
    }
    if (empty > 0) row += empty;
    rows.push(row);
  }

  const { whiteKingside, whiteQueenside, blackKingside, blackQueenside } = position.castling;
  const castling =
    (whiteKingside ? 'K' : '') +
    (whiteQueenside ? 'Q' : '') +
    (blackKingside ? 'k' : '') +
    (blackQueenside ? 'q' : '');

  return [
    rows.join('/'),
    position.turn,
    castling || '-',
    position.enPassant ?? '-',
    position.halfMoveClock,
    position.fullMoveNumber,
  ].join(' ');
}

/**
 * Check that a FEN string parses
 */
export function isValidFen(fen: string): boolean {
  try {
    parseFen(fen);
    return true;
  } catch (err) {
    if (err instanceof InvalidFenError) return false;
    throw err;
  }
}

// =============================================================================
// Coordinate Notation
// =============================================================================

/**
 * Parse coordinate notation ("e2e4", "e7e8q") into a MoveInput.
 * Only the shape is checked; legality is the board's concern.
 */
export function parseCoordinateMove(text: string): MoveInput {
  const match = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/.exec(text.trim().toLowerCase());
  const from = match?.[1];
  const to = match?.[2];
  if (!from || !to || !isSquare(from) || !isSquare(to)) {
    throw new IllegalMoveError(text, 'expected coordinate notation such as e2e4 or e7e8q');
  }

  const promotion = PROMOTION_TYPES.find(t => t === match?.[3]);
  return promotion ? { from, to, promotion } : { from, to };
}

export function formatCoordinateMove(move: MoveInput): string {
  return moveKey(move);
}

/** Whether a string looks like coordinate notation rather than SAN */
export function isCoordinateMove(text: string): boolean {
  return /^[a-h][1-8][a-h][1-8][qrbn]?$/i.test(text.trim());
}

// =============================================================================
// Standard Algebraic Notation
// =============================================================================

const SAN_LETTERS: Record<PromotionType | 'k', string> = {
  n: 'N', b: 'B', r: 'R', q: 'Q', k: 'K',
};

/**
 * SAN for a legal move of the position, with check (+) and mate (#) suffixes
 */
export function toSan(position: Position, move: Move): string {
  let san: string;

  if (move.flags.includes('k')) {
    san = 'O-O';
  } else if (move.flags.includes('q')) {
    san = 'O-O-O';
  } else if (move.piece === 'p') {
    san = move.captured ? `${move.from[0]}x${move.to}` : move.to;
    if (move.promotion) {
      san += `=${SAN_LETTERS[move.promotion]}`;
    }
  } else {
    san = SAN_LETTERS[move.piece] + disambiguation(position, move) + (move.captured ? 'x' : '') + move.to;
  }

  const record = position.makeMove(move);
  try {
    if (isInCheck(position)) {
      san += hasLegalMove(position) ? '+' : '#';
    }
  } finally {
    position.unmakeMove(record);
  }

  return san;
}

/** File, rank or both, when another piece of the same kind can reach the target */
function disambiguation(position: Position, move: Move): string {
  const rivals = legalMoves(position).filter(
    m => m.piece === move.piece && m.to === move.to && m.from !== move.from
  );
  if (rivals.length === 0) return '';

  const from = squareToIndex(move.from);
  const sameFile = rivals.some(m => fileOf(squareToIndex(m.from)) === fileOf(from));
  const sameRank = rivals.some(m => rankOf(squareToIndex(m.from)) === rankOf(from));

  if (!sameFile) return move.from[0];
  if (!sameRank) return move.from[1];
  return move.from;
}

function stripSuffixes(san: string): string {
  return san
    .replace(/\s*e\.p\.$/, '')
    .replace(/[+#!?]+$/, '')
    .replace(/^([a-h](?:x[a-h])?[18])([QRBN])$/, '$1=$2')
    .replace(/^0-0-0$/, 'O-O-O')
    .replace(/^0-0$/, 'O-O');
}

/**
 * Resolve SAN against the legal moves of a position
 * @throws IllegalMoveError when no legal move has that SAN
 */
export function parseSan(position: Position, san: string): Move {
  const wanted = stripSuffixes(san.trim());
  const move = legalMoves(position).find(m => stripSuffixes(toSan(position, m)) === wanted);
  if (!move) {
    throw new IllegalMoveError(san);
  }
  return move;
}

// =============================================================================
// Display
// =============================================================================

/**
 * ASCII diagram, rank 8 at the top
 */
export function ascii(position: Position): string {
  let s = '   +------------------------+\n';
  for (let rank = 7; rank >= 0; rank--) {
    s += ` ${rank + 1} |`;
    for (let file = 0; file < 8; file++) {
      const piece = position.pieceAtIndex(rank * 8 + file);
      s += ` ${piece ? pieceToChar(piece) : '.'} `;
    }
    s += '|\n';
  }
  s += '   +------------------------+\n';
  s += `     ${FILES.join('  ')}`;
  return s;
}

/** Unicode glyph for a piece */
export function pieceGlyph(piece: Piece): string {
  return PIECE_UNICODE[pieceToChar(piece)];
}
