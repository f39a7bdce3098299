/**
 * EngineErrors.ts
 * Error types for the heads-up game engine
 *
 * IllegalActionError is the only error a caller is expected to recover from;
 * it is returned (not thrown) by TableEngine.apply. Everything else signals a
 * programming error or a broken invariant.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum EngineErrorCode {
  // Illegal actions (recoverable)
  NO_ACTIVE_HAND = 'NO_ACTIVE_HAND',
  NOT_YOUR_TURN = 'NOT_YOUR_TURN',
  ACTION_NOT_AVAILABLE = 'ACTION_NOT_AVAILABLE',
  INVALID_AMOUNT = 'INVALID_AMOUNT',

  // Misuse
  INVALID_TABLE_CONFIG = 'INVALID_TABLE_CONFIG',
  HAND_IN_PROGRESS = 'HAND_IN_PROGRESS',
  SESSION_OVER = 'SESSION_OVER',
  INVALID_DECK = 'INVALID_DECK',
  DECK_EXHAUSTED = 'DECK_EXHAUSTED',

  // Invariants
  CHIP_CONSERVATION_VIOLATED = 'CHIP_CONSERVATION_VIOLATED',
}

export type IllegalActionCode =
  | EngineErrorCode.NO_ACTIVE_HAND
  | EngineErrorCode.NOT_YOUR_TURN
  | EngineErrorCode.ACTION_NOT_AVAILABLE
  | EngineErrorCode.INVALID_AMOUNT;

// ============================================================================
// Base Error Class
// ============================================================================

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export class IllegalActionError extends EngineError {
  constructor(
    code: IllegalActionCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'IllegalActionError';
    Object.setPrototypeOf(this, IllegalActionError.prototype);
  }
}

export class ChipConservationError extends EngineError {
  constructor(expected: number, actual: number, handNumber: number) {
    super(
      EngineErrorCode.CHIP_CONSERVATION_VIOLATED,
      `Chip conservation violated in hand ${handNumber}: expected ${expected}, found ${actual}`,
      { expected, actual, handNumber }
    );
    this.name = 'ChipConservationError';
    Object.setPrototypeOf(this, ChipConservationError.prototype);
  }
}
