import type FileData from "./fileData.js";
import type { NodeMcuError } from "./errors.js";

/**
 * The type of an operation result.
 */
export enum OperationResultType {
  none,
  commandResponse,
  commandResult,
  listFiles,
  heap,
  upload,
  download,
  error,
}

/**
 * The result type collection for operations.
 */
export type OperationResult =
  | OpResultNone
  | OpResultCommandResponse
  | OpResultCommandResult
  | OpResultListFiles
  | OpResultHeap
  | OpResultUpload
  | OpResultDownload
  | OpResultError;

/**
 * The base interface for all operation results.
 */
interface OpResult {
  type: OperationResultType;
}

/**
 * Returned if no board is connected.
 */
export interface OpResultNone extends OpResult {
  type: OperationResultType.none;
}

export interface OpResultCommandResponse extends OpResult {
  type: OperationResultType.commandResponse;
  response: string;
}

export interface OpResultCommandResult extends OpResult {
  type: OperationResultType.commandResult;
  result: boolean;
}

export interface OpResultListFiles extends OpResult {
  type: OperationResultType.listFiles;
  files: FileData[];
}

export interface OpResultHeap extends OpResult {
  type: OperationResultType.heap;
  // free bytes
  heap: number;
}

export interface OpResultUpload extends OpResult {
  type: OperationResultType.upload;
  remotePath: string;
  bytesWritten: number;
  chunks: number;
}

export interface OpResultDownload extends OpResult {
  type: OperationResultType.download;
  localPath: string;
  data: Buffer;
}

/**
 * The operation failed at the protocol level, `error.kind` tells how.
 */
export interface OpResultError extends OpResult {
  type: OperationResultType.error;
  error: NodeMcuError;
}
