import { Chess } from 'chess.js';
import { decisiveResult, drawResult } from '../../../shared/types/game';
import type { BoardPosition, MoveApplication, PositionOutcome, RulesOracle } from './RulesOracle';

/**
 * Standard chess rules backed by chess.js.
 *
 * The engine that produced a position stays attached to it, so a game's
 * next move and its outcome check run against that engine. A position with
 * no attached engine (or one already moved from) is rebuilt by replaying its
 * move list.
 */
export class ChessRulesOracle implements RulesOracle {
  private readonly engines = new WeakMap<BoardPosition, Chess>();

  public newGame(): BoardPosition {
    const chess = new Chess();
    const position: BoardPosition = { fen: chess.fen(), moves: [] };
    this.engines.set(position, chess);
    return position;
  }

  public applyMove(position: BoardPosition, moveText: string): MoveApplication {
    const chess = this.engineFor(position);
    try {
      // chess.js leaves the board unchanged when it rejects a move.
      const move = chess.move(moveText.trim());
      const next: BoardPosition = { fen: chess.fen(), moves: [...position.moves, move.san] };
      this.engines.delete(position);
      this.engines.set(next, chess);
      return { ok: true, san: move.san, position: next };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  public outcome(position: BoardPosition): PositionOutcome {
    const chess = this.engineFor(position);

    if (chess.isCheckmate()) {
      // The side to move has been mated.
      return { isTerminal: true, result: decisiveResult(chess.turn() === 'w' ? 'black' : 'white', 'checkmate') };
    }
    if (chess.isStalemate()) {
      return { isTerminal: true, result: drawResult('stalemate') };
    }
    if (chess.isInsufficientMaterial()) {
      return { isTerminal: true, result: drawResult('insufficient material') };
    }
    if (chess.isThreefoldRepetition()) {
      return { isTerminal: true, result: drawResult('threefold repetition') };
    }
    if (chess.isDraw()) {
      // Remaining draw condition is the fifty-move rule.
      return { isTerminal: true, result: drawResult('fifty-move rule') };
    }
    return { isTerminal: false };
  }

  public renderPosition(position: BoardPosition): string {
    return position.fen;
  }

  private engineFor(position: BoardPosition): Chess {
    return this.engines.get(position) ?? this.replay(position);
  }

  private replay(position: BoardPosition): Chess {
    const chess = new Chess();
    for (const san of position.moves) {
      chess.move(san);
    }
    return chess;
  }
}
