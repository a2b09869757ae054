/**
 * @tether/core
 *
 * Runtime-agnostic core of the native UI bridge.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, logging, configuration
// =============================================================================

export {
  TETHER_ERROR_CODES,
  TetherError,
  type TetherErrorCode,
  type TetherErrorOptions,
  describeThrown,
  isTetherError,
  isTetherErrorCode,
  raiseFatal,
} from "./errors.js";

export {
  SILENT_LOGGER,
  consoleSink,
  createLogger,
  formatLogRecord,
  parseLogSeverity,
  severityToNum,
  type CreateLoggerOptions,
  type LogFields,
  type LogRecord,
  type LogSeverity,
  type LogSink,
  type Logger,
} from "./logger.js";

export {
  DEFAULT_CONFIG,
  mergeConfig,
  resolveConfig,
  type ResolvedTetherConfig,
  type TetherConfig,
} from "./config.js";

// =============================================================================
// Payloads and reply envelopes
// =============================================================================

export { EMPTY_PAYLOAD, createPayload, parsePayload, type Payload } from "./payload/payload.js";

export {
  CorrelatedReplySchema,
  ReplyEnvelopeSchema,
  WireErrorSchema,
  decodeCorrelatedReply,
  decodeReply,
  encodeCorrelatedReply,
  encodeErrorReply,
  encodeReply,
  fromWireError,
  toWireError,
  unwrapReply,
  type CorrelatedReply,
  type ReplyEnvelope,
  type ReplyResult,
  type WireError,
} from "./payload/envelope.js";

// =============================================================================
// Bridge, dispatch queue, platform client
// =============================================================================

export {
  BRIDGE_URL_BASE,
  normalizeHandlerPath,
  parseBridgePath,
  withQuery,
  type BridgePath,
} from "./bridge/path.js";

export {
  createAppBridge,
  type AppBridge,
  type AppBridgeOptions,
  type BridgeHandler,
  type HandlerResult,
} from "./bridge/appBridge.js";

export {
  createDispatchQueue,
  type DispatchQueue,
  type DispatchQueueOptions,
  type DispatchQueueState,
  type DispatchTask,
  type FatalListener,
  type FatalReport,
} from "./dispatch/dispatchQueue.js";

export {
  createPlatformClient,
  type PlatformClient,
  type PlatformClientOptions,
  type PlatformClientStats,
  type PlatformTransport,
  type RequestOptions,
} from "./platform/platformClient.js";

// =============================================================================
// Navigation: history, pages, element directory
// =============================================================================

export {
  createHistory,
  type History,
  type HistoryOptions,
  type HistorySnapshot,
} from "./history/history.js";

export type {
  Component,
  ComponentCreator,
  Markup,
  MarkupFactory,
  PageConfig,
} from "./page/types.js";
export { componentNameFromUrl } from "./page/componentName.js";
export { createComponentFactory, type ComponentFactory } from "./page/componentFactory.js";
export { createPage, type Page, type PageContext } from "./page/page.js";

export {
  createElementDirectory,
  type DirectoryElement,
  type ElementDirectory,
} from "./elements/directory.js";

// =============================================================================
// Context and driver
// =============================================================================

export {
  createTetherContext,
  type TetherContext,
  type TetherContextOptions,
} from "./driver/context.js";

export {
  createDriver,
  type Driver,
  type DriverCallbacks,
  type ShareValue,
} from "./driver/driver.js";
