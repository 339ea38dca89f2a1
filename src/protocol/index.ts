/**
 * Protocol module — styled document encoding for spooled jobs.
 */

export {
  DocumentCodec,
  DocumentDecodeError,
  DocumentEncodeError,
  DOCUMENT_VERSION,
  MAX_DOCUMENT_DEPTH,
  FLAG_BITS,
  createDocumentCodec,
  decodeDocument,
  encodeDocument,
} from './encoding.js';
