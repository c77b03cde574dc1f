export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum SLOT_MAP_ERROR {
  INVALID_OPTIONS = "INVALID_OPTIONS",
  INDEX_SPACE_EXHAUSTED = "INDEX_SPACE_EXHAUSTED",
  GENERATION_EXHAUSTED = "GENERATION_EXHAUSTED",
  HANDLE_FIELD_OVERFLOW = "HANDLE_FIELD_OVERFLOW",
  POSITION_OUT_OF_RANGE = "POSITION_OUT_OF_RANGE",
  ITEM_NOT_FOUND = "ITEM_NOT_FOUND",
  INVALID_RESIZE = "INVALID_RESIZE",
  DISPOSED = "DISPOSED",
  CONCURRENT_MODIFICATION = "CONCURRENT_MODIFICATION",
}

/**
 * Capacity exhaustion and misuse of the slot map.
 *
 * A stale handle is never reported through this class: lookups and
 * handle-based removal answer with `undefined` / `false` instead.
 */
export class SlotMapError extends AppError {
  constructor(
    public readonly category: SLOT_MAP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    // Invalid options are caught at construction, everything else means
    // the map was driven past a designed-in limit or used out of contract.
    super(message ?? category, category === SLOT_MAP_ERROR.INVALID_OPTIONS, context);
  }
}

export function is_slot_map_error(error: unknown): error is SlotMapError {
  return error instanceof SlotMapError;
}
