/**
 * Error taxonomy for editor operations
 */
export enum EditorErrorKind {
  /** Source file does not exist */
  FILE_NOT_FOUND = 'file_not_found',
  /** Read or write failed */
  IO_FAILURE = 'io_failure',
  /** Caller declined to load a file above the large-file threshold */
  LOAD_DECLINED = 'load_declined',
  /** Malformed hex token in search, replace or paste input */
  INVALID_PATTERN = 'invalid_pattern',
  /** Offset or selection outside buffer bounds */
  OUT_OF_RANGE = 'out_of_range',
  /** Inspector conversion failed */
  DECODE_FAILURE = 'decode_failure',
  /** Operation requires a loaded buffer */
  NO_BUFFER = 'no_buffer'
}

/**
 * Kinds of undoable edits. Only fixed-size modification exists.
 */
export enum EditKind {
  MODIFY = 'modify'
}

/**
 * Byte order used by the data inspector
 */
export enum Endianness {
  LITTLE = 'little',
  BIG = 'big'
}

/**
 * Value interpretations offered by the data inspector
 */
export enum DecodeKind {
  INT8 = 'int8',
  UINT8 = 'uint8',
  INT16 = 'int16',
  UINT16 = 'uint16',
  INT32 = 'int32',
  UINT32 = 'uint32',
  INT64 = 'int64',
  UINT64 = 'uint64',
  FLOAT32 = 'float32',
  FLOAT64 = 'float64',
  STRING = 'string',
  BINARY = 'binary'
}

/**
 * How a search query was interpreted
 */
export enum QueryMode {
  HEX = 'hex',
  WILDCARD_HEX = 'wildcard_hex',
  TEXT = 'text'
}

/**
 * Notification types emitted by an editing session
 */
export enum NotificationType {
  FILE_LOADED = 'file_loaded',
  FILE_SAVED = 'file_saved',
  FILE_CLOSED = 'file_closed',
  BUFFER_MODIFIED = 'buffer_modified',
  LINE_INVALIDATED = 'line_invalidated',
  DISPLAY_INVALIDATED = 'display_invalidated',
  CURSOR_MOVED = 'cursor_moved',
  SEARCH_COMPLETED = 'search_completed',
  ANALYSIS_COMPLETED = 'analysis_completed',
  STATUS = 'status',
  ERROR = 'error'
}

/**
 * Notification severity
 */
export enum Severity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error'
}
