export { createScanner, scan, tokenize, type Scanner, type ScanResult } from './scanner/scanner.js';
export { createScanBuffer, type ScanBuffer, type ScanBufferDebugState } from './scanner/scan-buffer.js';
export { ScanError } from './scanner/scan-error.js';
export * from './scanner/token-types.js';
export {
  defineLanguage,
  type Candidate,
  type Language,
  type LanguageConfig,
  type LanguageOptions,
  type MultiLineCommentMarkers,
} from './scanner/language.js';

// Language files
export * from './languages/language-file.js';

// Debug output
export { dump, formatToken, type DumpSink } from './dump.js';
export { lenientLogLevel, logger, resolveLogLevel } from './logger.js';
