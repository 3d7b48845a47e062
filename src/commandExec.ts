import { readFile, writeFile } from "fs/promises";
import { basename } from "path";
import type { Transport } from "./transport.js";
import { type Command, CommandType, type TypedCommand } from "./command.js";
import {
  type OperationResult,
  OperationResultType,
} from "./operationResult.js";
import type { VerifyMode } from "./config.js";
import { isNodeMcuError } from "./errors.js";
import { executeCommand } from "./serialHelper.js";
import {
  downloadFile,
  prepareReceiver,
  uploadBuffer,
  verifyUpload,
} from "./fileTransfer.js";
import {
  execLocalFile,
  fileCompile,
  fileDo,
  fileFormat,
  fileList,
  fileRemove,
  nodeHeap,
  nodeRestart,
} from "./nodeCommands.js";
import type { ProgressCallback } from "./progressCallback.js";

/**
 * Session settings a command needs besides its own arguments.
 */
export interface ExecutionContext {
  baudRate: number;
  timeout: number;
  verify: VerifyMode;
}

/**
 * Execute any type of command on a board connected to a transport
 * and return the result.
 *
 * Protocol failures are returned as error results, everything else
 * (local file system, serial port) rejects.
 *
 * @param transport The transport the board is connected to.
 * @param command The command to execute.
 * @param context The session settings.
 * @param progressCallback Receives transfer progress (uploads and downloads).
 * @returns The result of the operation.
 */
export async function executeAnyCommand(
  transport: Transport,
  command: Command,
  context: ExecutionContext,
  progressCallback?: ProgressCallback
): Promise<OperationResult> {
  try {
    return await dispatchCommand(
      transport,
      command,
      context,
      progressCallback
    );
  } catch (error) {
    if (isNodeMcuError(error)) {
      console.error(`${error.name}: ${error.message}`);

      return { type: OperationResultType.error, error };
    }

    throw error;
  }
}

async function dispatchCommand(
  transport: Transport,
  command: Command,
  context: ExecutionContext,
  progressCallback?: ProgressCallback
): Promise<OperationResult> {
  const { timeout } = context;

  switch (command.type) {
    case CommandType.command:
      return {
        type: OperationResultType.commandResponse,
        response: await executeCommand(
          transport,
          command.args.command,
          timeout
        ),
      };

    case CommandType.prepare:
      await prepareReceiver(transport, context.baudRate, timeout);

      return { type: OperationResultType.commandResult, result: true };

    case CommandType.listFiles:
      return {
        type: OperationResultType.listFiles,
        files: await fileList(transport, timeout),
      };

    case CommandType.removeFile:
      return {
        type: OperationResultType.commandResponse,
        response: await fileRemove(transport, command.args.file, timeout),
      };

    case CommandType.doFile:
      return {
        type: OperationResultType.commandResponse,
        response: await fileDo(transport, command.args.file, timeout),
      };

    case CommandType.compileFile:
      return {
        type: OperationResultType.commandResponse,
        response: await fileCompile(transport, command.args.file, timeout),
      };

    case CommandType.formatFs:
      return {
        type: OperationResultType.commandResponse,
        response: await fileFormat(transport, timeout),
      };

    case CommandType.heap:
      return {
        type: OperationResultType.heap,
        heap: await nodeHeap(transport, timeout),
      };

    case CommandType.restart:
      return {
        type: OperationResultType.commandResponse,
        response: await nodeRestart(transport, timeout),
      };

    case CommandType.uploadFile:
      return executeUploadFileCommand(
        transport,
        command,
        context,
        progressCallback
      );

    case CommandType.downloadFile:
      return executeDownloadFileCommand(
        transport,
        command,
        timeout,
        progressCallback
      );

    case CommandType.execFile:
      return {
        type: OperationResultType.commandResponse,
        response: await execLocalFile(transport, command.args.file, timeout),
      };
  }
}

/**
 * Uploads a local file and verifies it with the configured mode.
 */
async function executeUploadFileCommand(
  transport: Transport,
  command: TypedCommand<CommandType.uploadFile>,
  context: ExecutionContext,
  progressCallback?: ProgressCallback
): Promise<OperationResult> {
  const { local } = command.args;
  const remote = command.args.remote ?? basename(local);
  console.info(`Transfering ${local} as ${remote}`);

  const content = await readFile(local);
  const stats = await uploadBuffer(
    transport,
    content,
    remote,
    context.timeout,
    progressCallback
  );
  await verifyUpload(
    transport,
    remote,
    content,
    context.verify,
    context.timeout
  );

  return {
    type: OperationResultType.upload,
    remotePath: remote,
    bytesWritten: stats.bytesWritten,
    chunks: stats.chunks,
  };
}

/**
 * Downloads a file from the board and stores it locally.
 */
async function executeDownloadFileCommand(
  transport: Transport,
  command: TypedCommand<CommandType.downloadFile>,
  timeout: number,
  progressCallback?: ProgressCallback
): Promise<OperationResult> {
  const { remote } = command.args;
  const local = command.args.local ?? basename(remote);
  console.info(`Transfering ${remote} to ${local}`);

  const data = await downloadFile(
    transport,
    remote,
    timeout,
    undefined,
    progressCallback
  );
  await writeFile(local, data);

  return { type: OperationResultType.download, localPath: local, data };
}
