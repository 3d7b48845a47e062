import { EventEmitter } from "events";
import { SerialPort } from "serialport";
import { NodeMcuSerialEvents } from "./nodeMcuSerialEvents.js";
import { type Transport, openSerialTransport } from "./transport.js";
import {
  DEFAULT_BAUD_RATE,
  type NodeMcuConfig,
  type NodeMcuConfigOptions,
  resolveConfig,
} from "./config.js";
import { CommandType, type Command } from "./command.js";
import {
  type OperationResult,
  OperationResultType,
} from "./operationResult.js";
import { executeAnyCommand } from "./commandExec.js";
import { ErrorKind, isNodeMcuError } from "./errors.js";
import {
  changeBaudRate,
  restoreBaudRate,
  synchronize,
} from "./serialHelper.js";
import { isUsbDeviceSupported } from "./usbIds.js";
import type { ProgressCallback } from "./progressCallback.js";

/**
 * Whether the interpreter is known to sit at a fresh prompt.
 */
export enum SyncState {
  unsynced = "unsynced",
  synced = "synced",
}

// after these failures the position in the stream is unknown
const DESYNCING_ERRORS = [ErrorKind.sync, ErrorKind.protocol, ErrorKind.timeout];

/**
 * Handles the serial communication with a NodeMCU board.
 *
 * Operations are executed strictly one after another in the order they were
 * requested. Every operation resolves to an {@link OperationResult}, protocol
 * failures included. Operations requested while no synchronized session
 * exists resolve to {@link OperationResultType.none}.
 */
export class NodeMcuCom extends EventEmitter {
  private readonly config: NodeMcuConfig;
  private transport?: Transport;
  private state = SyncState.unsynced;
  // not sent to the board, reserved for numbering requests
  private operationCounter = 0;
  private operationChain: Promise<void> = Promise.resolve();

  /**
   * @param options The session configuration, see {@link resolveConfig}.
   * @throws RangeError if the configuration is invalid.
   */
  constructor(options: NodeMcuConfigOptions) {
    super();
    this.config = resolveConfig(options);
  }

  /**
   * Returns a list of available serial ports that belong to known USB-UART bridges.
   */
  public static async getSerialPorts(): Promise<string[]> {
    const ports = await SerialPort.list();

    return ports.filter(isUsbDeviceSupported).map(port => port.path);
  }

  public get syncState(): SyncState {
    return this.state;
  }

  public get baudRate(): number {
    return this.transport?.baudRate ?? DEFAULT_BAUD_RATE;
  }

  public get timeout(): number {
    return this.config.timeout;
  }

  public get operationCount(): number {
    return this.operationCounter;
  }

  public isSynced(): boolean {
    return this.transport !== undefined && this.state === SyncState.synced;
  }

  /**
   * Opens the configured serial port, resets the board and synchronizes with
   * the interpreter. Switches to the configured baud rate afterwards.
   *
   * @param transport Use this transport instead of opening the configured port.
   * @throws SyncError if the interpreter does not answer, the port is closed then.
   */
  public async open(transport?: Transport): Promise<void> {
    if (this.transport) {
      await this.close();
    }

    const t =
      transport ??
      (await openSerialTransport(
        this.config.port,
        DEFAULT_BAUD_RATE,
        this.config.timeout
      ));
    t.timeout = this.config.timeout;
    this.transport = t;
    this.emit(NodeMcuSerialEvents.portOpened);

    try {
      // RTS is wired to reset and DTR to GPIO0 on most boards
      await t.setSignals({ rts: false, dtr: false });
      await this.handshake(t);
    } catch (error) {
      this.transport = undefined;
      this.emit(NodeMcuSerialEvents.portError, error);
      try {
        await t.close();
      } catch (closeError) {
        console.error(
          "Failed to close the port after a failed sync:",
          closeError
        );
      }
      this.emit(NodeMcuSerialEvents.portClosed);

      throw error;
    }
  }

  private async handshake(transport: Transport): Promise<void> {
    this.state = SyncState.unsynced;
    if (transport.baudRate !== DEFAULT_BAUD_RATE) {
      await transport.setBaudRate(DEFAULT_BAUD_RATE);
    }

    await synchronize(transport, this.config.timeout);
    if (this.config.baudRate !== DEFAULT_BAUD_RATE) {
      await changeBaudRate(transport, this.config.baudRate, this.config.timeout);
    }

    this.state = SyncState.synced;
    this.emit(NodeMcuSerialEvents.synced, transport.baudRate);
  }

  /**
   * Restores the default baud rate on the board and closes the port.
   * Waits for running operations to finish first.
   */
  public async close(): Promise<void> {
    await this.operationChain;

    const transport = this.transport;
    if (!transport) {
      return;
    }
    this.transport = undefined;
    this.state = SyncState.unsynced;

    try {
      await restoreBaudRate(transport);
    } finally {
      await transport.close();
      this.emit(NodeMcuSerialEvents.portClosed);
    }
  }

  /**
   * Chains an operation behind all previously requested ones.
   */
  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.operationChain.then(operation);
    this.operationChain = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }

  /**
   * The main method for enqueueing commands.
   *
   * @param command The command to execute.
   * @param progressCallback Receives transfer progress.
   * @returns The result of the operation.
   */
  private async enqueueCommandOperation(
    command: Command,
    progressCallback?: ProgressCallback
  ): Promise<OperationResult> {
    return this.enqueue(async (): Promise<OperationResult> => {
      const transport = this.transport;
      if (!transport || this.state !== SyncState.synced) {
        return { type: OperationResultType.none };
      }
      this.operationCounter++;

      const result = await executeAnyCommand(
        transport,
        command,
        {
          baudRate: transport.baudRate,
          timeout: this.config.timeout,
          verify: this.config.verify,
        },
        progressCallback
      );

      if (
        result.type === OperationResultType.error &&
        DESYNCING_ERRORS.includes(result.error.kind)
      ) {
        this.state = SyncState.unsynced;
      } else if (command.type === CommandType.restart) {
        return this.resyncAfterRestart(transport, result);
      }

      return result;
    });
  }

  private async resyncAfterRestart(
    transport: Transport,
    result: OperationResult
  ): Promise<OperationResult> {
    try {
      await this.handshake(transport);
    } catch (error) {
      if (isNodeMcuError(error)) {
        return { type: OperationResultType.error, error };
      }
      throw error;
    }

    return result;
  }

  /**
   * Runs the sync handshake again, e.g. after a failed operation left
   * the stream in an unknown state.
   *
   * @returns True if the board answered.
   */
  public async resync(): Promise<boolean> {
    return this.enqueue(async (): Promise<boolean> => {
      const transport = this.transport;
      if (!transport) {
        return false;
      }

      try {
        await this.handshake(transport);

        return true;
      } catch (error) {
        if (isNodeMcuError(error)) {
          console.error(`${error.name}: ${error.message}`);

          return false;
        }
        throw error;
      }
    });
  }

  /**
   * Sends a line to the interpreter and returns its response.
   *
   * @param command The Lua line to execute.
   */
  public async runCommand(command: string): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.command,
      args: { command },
    });
  }

  /**
   * Types the receiver routines into the interpreter. Required once per
   * boot before files can be uploaded.
   */
  public async prepare(): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.prepare,
      args: {},
    });
  }

  /**
   * Lists the files on the board.
   */
  public async listFiles(): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.listFiles,
      args: {},
    });
  }

  public async removeFile(file: string): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.removeFile,
      args: { file },
    });
  }

  /**
   * Executes a Lua file stored on the board.
   */
  public async doFile(file: string): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.doFile,
      args: { file },
    });
  }

  public async compileFile(file: string): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.compileFile,
      args: { file },
    });
  }

  /**
   * Formats the filesystem of the board. All files are lost.
   */
  public async formatFs(): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.formatFs,
      args: {},
    });
  }

  public async heap(): Promise<OperationResult> {
    return this.enqueueCommandOperation({ type: CommandType.heap, args: {} });
  }

  /**
   * Restarts the board and synchronizes with it again.
   */
  public async restart(): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.restart,
      args: {},
    });
  }

  /**
   * Uploads a local file to the board and verifies it with the configured mode.
   *
   * @param local Path of the local file.
   * @param remote Name on the board, defaults to the base name of the local file.
   * @param progressCallback The callback to receive the progress of the operation.
   */
  public async uploadFile(
    local: string,
    remote?: string,
    progressCallback?: ProgressCallback
  ): Promise<OperationResult> {
    return this.enqueueCommandOperation(
      { type: CommandType.uploadFile, args: { local, remote } },
      progressCallback
    );
  }

  /**
   * Downloads a file from the board.
   *
   * @param remote Name of the file on the board.
   * @param local Local target path, defaults to the remote name.
   * @param progressCallback The callback to receive the progress of the operation.
   */
  public async downloadFile(
    remote: string,
    local?: string,
    progressCallback?: ProgressCallback
  ): Promise<OperationResult> {
    return this.enqueueCommandOperation(
      { type: CommandType.downloadFile, args: { remote, local } },
      progressCallback
    );
  }

  /**
   * Sends a local Lua file line by line to the interpreter.
   */
  public async execFile(file: string): Promise<OperationResult> {
    return this.enqueueCommandOperation({
      type: CommandType.execFile,
      args: { file },
    });
  }
}
