import Chance from 'chance';
import { logger } from '@banterbot/shared';

export interface GameState {
  secretNumber: number;
  attemptsLeft: number;
  maxRange: number;
}

export interface GameOutcome {
  /** true when a game started or was won */
  success: boolean;
  message: string;
  /** The game is gone after this move (won, lost or ended) */
  finished: boolean;
}

export interface GameManagerOptions {
  maxAttempts: number;
  chance?: Chance.Chance;
}

/**
 * Number guessing game, one per user. Lives in memory only; a restart ends
 * every game.
 */
export class GameManager {
  private readonly games = new Map<string, GameState>();
  private readonly chance: Chance.Chance;

  constructor(private readonly options: GameManagerOptions) {
    this.chance = options.chance ?? new Chance();
  }

  startGame(userId: string, maxRange: number): GameOutcome {
    if (this.games.has(userId)) {
      return {
        success: false,
        finished: false,
        message: 'You already got a game going! Finish it or use /end first.',
      };
    }
    if (!Number.isInteger(maxRange) || maxRange < 1) {
      return { success: false, finished: false, message: 'Bruh give me a number bigger than 1 💀' };
    }

    const attempts = this.options.maxAttempts;
    this.games.set(userId, {
      secretNumber: this.chance.integer({ min: 1, max: maxRange }),
      attemptsLeft: attempts,
      maxRange,
    });

    logger.info(`🎲 Started game for ${userId} with range 1-${maxRange}`);
    return {
      success: true,
      finished: false,
      message: `Game Started! I'm thinking of a number between 1 and ${maxRange}. Start guessing with /guess <your number>. You got ${attempts} attempts.`,
    };
  }

  makeGuess(userId: string, guess: number): GameOutcome {
    const game = this.games.get(userId);
    if (!game) {
      return {
        success: false,
        finished: false,
        message: "You don't have a game going. Start one with /game <max_range>",
      };
    }

    if (guess === game.secretNumber) {
      this.games.delete(userId);
      logger.info(`🏆 ${userId} won their game`);
      return { success: true, finished: true, message: `YOOO YOU GOT IT! The number was ${game.secretNumber} 🔥` };
    }

    game.attemptsLeft -= 1;
    if (game.attemptsLeft > 0) {
      const hint = game.secretNumber > guess ? 'higher' : 'lower';
      return {
        success: false,
        finished: false,
        message: `Nah that ain't it. You got ${game.attemptsLeft} tries left! The number is ${hint} than ${guess}`,
      };
    }

    this.games.delete(userId);
    logger.info(`💀 ${userId} lost their game`);
    return {
      success: false,
      finished: true,
      message: `RIP GAME OVER! The number was ${game.secretNumber}. Better luck next time 💀`,
    };
  }

  endGame(userId: string): GameOutcome {
    if (this.games.delete(userId)) {
      logger.info(`Ended game for ${userId}`);
      return { success: true, finished: true, message: 'gg thanks for playing' };
    }
    return { success: false, finished: false, message: "You don't even have a game going rn" };
  }

  getActiveGame(userId: string): Readonly<GameState> | undefined {
    return this.games.get(userId);
  }

  hasActiveGame(userId: string): boolean {
    return this.games.has(userId);
  }

  get activeGames(): number {
    return this.games.size;
  }
}
