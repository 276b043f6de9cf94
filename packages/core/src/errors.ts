import type { Direction } from "./types.js";

export type TokenGridErrorCode =
  | "NO_ANCHOR_AVAILABLE"
  | "PLACEMENT_CAPACITY_EXCEEDED"
  | "INVALID_OPTIONS"
  | "INVALID_ROW";

/** Base class for every error raised by tokengrid. */
export class TokenGridError extends Error {
  readonly code: TokenGridErrorCode;

  constructor(code: TokenGridErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The password has no anchor at all, or none of the direction needed. */
export class NoAnchorAvailableError extends TokenGridError {
  readonly direction: Direction | null;

  constructor(direction: Direction | null = null) {
    super(
      "NO_ANCHOR_AVAILABLE",
      direction
        ? `Password yields no anchor with direction "${direction}"`
        : "Password yields no valid anchors"
    );
    this.direction = direction;
  }
}

export class PlacementCapacityExceededError extends TokenGridError {
  readonly required: number;
  readonly capacity: number;

  constructor(required: number, capacity: number, detail?: string) {
    super(
      "PLACEMENT_CAPACITY_EXCEEDED",
      detail ??
        `Message needs ${required} slots but the grid only has ${capacity}`
    );
    this.required = required;
    this.capacity = capacity;
  }
}

export class InvalidOptionsError extends TokenGridError {
  constructor(message: string) {
    super("INVALID_OPTIONS", message);
  }
}

export class InvalidRowError extends TokenGridError {
  readonly row: number;

  constructor(row: number, length: number) {
    super(
      "INVALID_ROW",
      `Row ${row} has odd length ${length}; rows must be whole 2-character tokens`
    );
    this.row = row;
  }
}
