export { NodeMcuCom, SyncState } from "./nodeMcuCom.js";
export { NodeMcuSerialEvents } from "./nodeMcuSerialEvents.js";
export {
  type NodeMcuConfig,
  type NodeMcuConfigOptions,
  DEFAULT_BAUD_RATE,
  DEFAULT_TIMEOUT,
  VerifyMode,
  defaultPort,
  resolveConfig,
} from "./config.js";
export {
  type ModemSignals,
  type Transport,
  SerialTransport,
  openSerialTransport,
} from "./transport.js";
export {
  ErrorKind,
  NodeMcuError,
  ParseError,
  ProtocolError,
  SyncError,
  TimeoutError,
  VerificationError,
  isNodeMcuError,
} from "./errors.js";
export { CommandType, type Command, type TypedCommand } from "./command.js";
export * from "./operationResult.js";
export type { default as FileData } from "./fileData.js";
export type { ProgressCallback } from "./progressCallback.js";
export { type ExpectResult, exchange, expect } from "./serialHelper.js";
