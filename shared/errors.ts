// ============================================
// ERROR CODES
// ============================================

export const ERROR_CODES = {
  UNSUPPORTED_ORDER: 'UNSUPPORTED_ORDER',
  UNSUPPORTED_SYMBOL_COUNT: 'UNSUPPORTED_SYMBOL_COUNT',
  LAYOUT_OVERLAP: 'LAYOUT_OVERLAP',
  INVALID_CONFIG: 'INVALID_CONFIG',
  INSUFFICIENT_SYMBOLS: 'INSUFFICIENT_SYMBOLS',
  INVALID_CARD: 'INVALID_CARD',
  DECK_EXISTS: 'DECK_EXISTS',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================
// ERROR CLASSES
// ============================================

export class DeckError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No deck design can be built for the requested symbols per card */
export class UnsupportedOrderError extends DeckError {
  constructor(readonly symbolsPerCard: number) {
    super(
      ERROR_CODES.UNSUPPORTED_ORDER,
      `Cannot build a deck with ${symbolsPerCard} symbols per card (must be an integer >= 2)`
    );
  }
}

/** No circle packing table entry exists for the card's symbol count */
export class UnsupportedSymbolCountError extends DeckError {
  constructor(readonly symbolCount: number, readonly packing: string) {
    super(
      ERROR_CODES.UNSUPPORTED_SYMBOL_COUNT,
      `No '${packing}' packing available for ${symbolCount} symbols`
    );
  }
}

/** Two placed circles overlap, or one leaves the card */
export class LayoutOverlapError extends DeckError {
  constructor(readonly cardId: number, detail: string) {
    super(ERROR_CODES.LAYOUT_OVERLAP, `Layout of card ${cardId} is invalid: ${detail}`);
  }
}

export class InvalidConfigError extends DeckError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_CONFIG, message);
  }
}

export class InsufficientSymbolsError extends DeckError {
  constructor(readonly required: number, readonly available: number) {
    super(
      ERROR_CODES.INSUFFICIENT_SYMBOLS,
      `Not enough symbols to build the deck: need ${required}, have ${available}`
    );
  }
}

export class InvalidCardError extends DeckError {
  constructor(readonly cardId: number, message: string) {
    super(ERROR_CODES.INVALID_CARD, `Card ${cardId}: ${message}`);
  }
}

export class DeckExistsError extends DeckError {
  constructor(readonly path: string) {
    super(ERROR_CODES.DECK_EXISTS, `Deck directory already exists: ${path}`);
  }
}
