export type {
  Direction,
  Anchor,
  Chunk,
  ChunkKind,
  Slot,
  SlotGrid,
  Grid,
  MessageTokens,
  PlacementReport,
  PlacementOptions,
  EncodeOptions,
  EncodeResult,
} from "./types.js";

export {
  TokenGridError,
  NoAnchorAvailableError,
  PlacementCapacityExceededError,
  InvalidOptionsError,
  InvalidRowError,
} from "./errors.js";
export type { TokenGridErrorCode } from "./errors.js";

export type { RandomSource } from "./random.js";
export { CryptoRandom, SeededRandom } from "./random.js";

export { extractAnchors, directionAt, AnchorTable } from "./anchors.js";
export { tokenizeMessage } from "./message.js";
export { encodeChunk, encodeChunks, chunkSlots } from "./chunk-encoder.js";
export { allocateGrid, GridLayout, placePaddingMarker } from "./grid.js";
export { placeChunks, DEFAULT_MAX_ATTEMPTS } from "./placer.js";
export { generateNoiseToken, fillNoise } from "./noise.js";
export { encode, encodeDetailed } from "./encoder.js";
export { decode, decodeRows } from "./decoder.js";
export { gridToRows, parseRows } from "./rows.js";
export { formatGrid } from "./format.js";

export {
  resolveEncodeOptions,
  loadConfig,
  DEFAULT_LINE_MAX,
  DEFAULT_TOTAL_MAX,
} from "./config.js";
export type { ResolvedEncodeOptions, TokenGridConfig } from "./config.js";

export {
  setLogLevel,
  getLogLevel,
  setLogSink,
  getLogBuffer,
  clearLogBuffer,
} from "./logger.js";
export type { LogEntry, LogLevel, LogThreshold, LogSink } from "./logger.js";
