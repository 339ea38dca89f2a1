export { Styled, styled, toNode } from './styled.js';
export type { Printable } from './styled.js';
export { Printer, PrinterIoError, connectPrinter } from './printer.js';
export type { PrinterOptions, ConnectPrinterOptions } from './printer.js';
export { StyleSet, strongerUnderline } from '../core/style.js';
export {
  text, group, withStyle, append,
  bold, underlined, doubleUnderlined, reversed, doubleStrike, upsideDown, rotated,
  walkTree, plainText, treeDepth,
} from '../core/tree.js';
export { render, renderLine } from '../core/render.js';
export { styleTransition, encodeTransition } from '../core/transition.js';
export {
  UnderlineThickness,
  SetEmphasized,
  SetUnderline,
  SetDoubleStrike,
  SetReverse,
  SetUpsideDown,
  SetRotation,
  LineFeed,
  Initialize,
  attributeCommand,
  encodeAttribute,
} from '../core/commands.js';
export type { AttributeState } from '../core/commands.js';
export { ATTRIBUTE_ORDER, FLAG_ATTRIBUTES, ESC, GS, LF } from '../core/types.js';
export type {
  Underline,
  FlagAttribute,
  Attribute,
  StyleAttrs,
  TextNode,
  GroupNode,
  StyledNode,
  Command,
} from '../core/types.js';
export {
  parsePrinterUri,
  resolveAddress,
  resolvePrinterTarget,
  describeAddress,
  PrinterUriError,
  DEFAULT_PRINTER_URI,
  RAW_PRINT_PORT,
} from '../core/printer-uri.js';
export type {
  PrinterScheme,
  PrinterAddress,
  ParsedPrinterUri,
  PrinterTarget,
} from '../core/printer-uri.js';
export {
  createDefaultRegistry,
  createMemoryConnection,
  MemoryConnection,
  StreamConnection,
  DEFAULT_CONNECT_TIMEOUT_MS,
} from '../transports/index.js';
export type {
  PrinterConnection,
  TransportConnector,
  ConnectOptions,
  ConnectionInfo,
} from '../core/transport-api.js';
export { TransportRegistry } from '../core/transport-registry.js';
export {
  mergeConfigs,
  parsePrinterArgs,
  resolvePrinterConfig,
  loadConfigFile,
  findConfigFile,
  ConfigError,
  DEFAULT_CONFIG,
} from '../core/printer-config.js';
export type { PrinterConfig, ParsedCli } from '../core/printer-config.js';
export { createLogger, silentLogger } from '../core/log.js';
export type { Logger, LogLevel, LogSink } from '../core/log.js';
export {
  encodeDocument,
  decodeDocument,
  DocumentDecodeError,
  DocumentEncodeError,
  MAX_DOCUMENT_DEPTH,
} from '../protocol/index.js';
export { interpretStream, toAnsi, textProjection } from '../preview/index.js';
export type { InterpretResult, PreviewLine, PreviewSegment } from '../preview/index.js';
