/**
 * Caretpad Engine - Buffer Module Exports
 */

export { TextBuffer, createTextBuffer } from './TextBuffer.js';
export type { TextBufferConfig } from './TextBuffer.js';
