export { interpretStream } from './interpreter.js';
export type { InterpretResult, PreviewLine, PreviewSegment } from './interpreter.js';
export { toAnsi, textProjection, sgrCodes } from './ansi.js';
