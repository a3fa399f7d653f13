/**
 * Chess error taxonomy
 *
 * Every error the core reports to callers is a ChessError with a stable
 * `code`. None of them are fatal; callers re-prompt or reject input.
 * InvariantError is the exception: it signals a corrupted position.
 */

import type { GameStatus, MoveInput } from './types.js';

export type ChessErrorCode =
  | 'ILLEGAL_MOVE'
  | 'INCOMPLETE_MOVE'
  | 'NO_HISTORY'
  | 'GAME_OVER'
  | 'INVALID_FEN'
  | 'INVALID_CONFIG'
  | 'INVARIANT';

export class ChessError extends Error {
  readonly code: ChessErrorCode;

  constructor(code: ChessErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

function describeMove(move: MoveInput): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

/** Move is not in the legal set for the current position */
export class IllegalMoveError extends ChessError {
  readonly move: MoveInput | string;

  constructor(move: MoveInput | string, reason?: string) {
    const text = typeof move === 'string' ? move : describeMove(move);
    super('ILLEGAL_MOVE', reason ? `Illegal move ${text}: ${reason}` : `Illegal move ${text}`);
    this.move = move;
  }
}

/** Pawn reaches the last rank but no promotion piece was named */
export class IncompleteMoveError extends ChessError {
  readonly move: MoveInput;

  constructor(move: MoveInput) {
    super('INCOMPLETE_MOVE', `Move ${describeMove(move)} requires a promotion piece (q, r, b or n)`);
    this.move = move;
  }
}

/** Undo requested with nothing to undo */
export class NoHistoryError extends ChessError {
  constructor() {
    super('NO_HISTORY', 'No move to undo');
  }
}

/** Move or search requested on a finished game */
export class GameOverError extends ChessError {
  readonly status: GameStatus;

  constructor(status: GameStatus) {
    super('GAME_OVER', `Game is over (${status.kind === 'draw' ? `draw by ${status.reason}` : status.kind})`);
    this.status = status;
  }
}

export class InvalidFenError extends ChessError {
  readonly fen: string;

  constructor(fen: string, reason: string) {
    super('INVALID_FEN', `Invalid FEN "${fen}": ${reason}`);
    this.fen = fen;
  }
}

export class InvalidConfigError extends ChessError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid search config: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Internal assertion; a position that reaches this state is corrupt */
export class InvariantError extends ChessError {
  constructor(message: string) {
    super('INVARIANT', message);
  }
}
