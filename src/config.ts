/**
 * @fileoverview Editor configuration and defaults
 */

interface EditorConfig {
  /** Undo groups kept before the oldest is evicted */
  maxUndoLevels: number;
  /** Loads above this many bytes need caller confirmation */
  largeFileThreshold: number;
  /** Maximum hits per search */
  searchResultLimit: number;
  /** Offset interval for the signature scan */
  signatureStride: number;
  minStringLength: number;
  stringResultLimit: number;
  bytesPerLine: number;
  recentFilesLimit: number;
  /** Bytes shown in a search result preview */
  previewLength: number;
}

const DEFAULT_CONFIG: Readonly<EditorConfig> = Object.freeze({
  maxUndoLevels: 100,
  largeFileThreshold: 500 * 1024 * 1024,
  searchResultLimit: 1000,
  signatureStride: 512,
  minStringLength: 4,
  stringResultLimit: 1000,
  bytesPerLine: 16,
  recentFilesLimit: 10,
  previewLength: 16
});

const CONFIG_KEYS: ReadonlyArray<keyof EditorConfig> = [
  'maxUndoLevels',
  'largeFileThreshold',
  'searchResultLimit',
  'signatureStride',
  'minStringLength',
  'stringResultLimit',
  'bytesPerLine',
  'recentFilesLimit',
  'previewLength'
];

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Merge a partial configuration over a base. Values that are not positive
 * integers are ignored.
 */
function resolveConfig(partial: Partial<EditorConfig> = {}, base: Readonly<EditorConfig> = DEFAULT_CONFIG): EditorConfig {
  const resolved: EditorConfig = { ...base };
  for (const key of CONFIG_KEYS) {
    const value = partial[key];
    if (isPositiveInteger(value)) {
      resolved[key] = value;
    }
  }
  return resolved;
}

export {
  DEFAULT_CONFIG,
  resolveConfig,
  type EditorConfig
};
