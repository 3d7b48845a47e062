import { createHash } from "crypto";
import type { Transport } from "./transport.js";
import {
  DOWNLOAD_CHUNK_SIZE,
  FILENAME_TERMINATOR,
  PROMPT,
  READY_PROMPT,
  UPLOAD_CHUNK_SIZE,
} from "./constants.js";
import { DEFAULT_TIMEOUT, VerifyMode } from "./config.js";
import {
  ProtocolError,
  TimeoutError,
  VerificationError,
} from "./errors.js";
import {
  TERMINATOR_FRAME,
  buildChunkFrame,
  buildDownloadCommand,
  luaQuote,
  parseDownloadChunk,
  parseHashResponse,
  prepareReceiverLines,
  splitIntoChunks,
} from "./packetProcessing.js";
import {
  exchange,
  executeCommand,
  expect,
  readAck,
  write,
  writeLine,
} from "./serialHelper.js";
import { RECEIVER_LUA } from "./luaCode.js";
import type { ProgressCallback } from "./progressCallback.js";

/**
 * Types the receiver routines into the interpreter.
 *
 * @param transport The transport to the board.
 * @param baudRate The baud rate the receiver restores after a transfer.
 * @throws ProtocolError if the interpreter rejects a line.
 * @throws TimeoutError if a line is not answered with a prompt.
 */
export async function prepareReceiver(
  transport: Transport,
  baudRate: number,
  timeout = DEFAULT_TIMEOUT
): Promise<void> {
  console.info("Preparing board for transfer.");

  for (const line of prepareReceiverLines(RECEIVER_LUA, baudRate)) {
    const { data, matched } = await exchange(transport, line, timeout);
    if (!matched) {
      throw new TimeoutError(
        `No prompt after receiver line ${JSON.stringify(line)}`,
        data
      );
    }
    const response = data.toString("latin1");
    // do some basic test of the result
    if (
      response.includes("unexpected") ||
      response.length > RECEIVER_LUA.length + 10
    ) {
      throw new ProtocolError(
        `Error while sending receiver: ${JSON.stringify(response)}`,
        data
      );
    }
  }
}

/**
 * Result of an upload.
 */
export interface UploadStats {
  bytesWritten: number;
  /**
   * Number of data chunks, the terminator is not counted.
   */
  chunks: number;
}

/**
 * Uploads data to a file on the board through the resident receiver.
 *
 * Every frame is acknowledged by the board before the next one is sent.
 *
 * @param transport The transport to the board.
 * @param content The file content.
 * @param destination The file name on the board.
 * @param progressCallback Called after every acknowledged chunk.
 * @throws ProtocolError if the receiver does not answer or does not ACK.
 */
export async function uploadBuffer(
  transport: Transport,
  content: Buffer,
  destination: string,
  timeout = DEFAULT_TIMEOUT,
  progressCallback?: ProgressCallback
): Promise<UploadStats> {
  await writeLine(transport, "recv()");
  const ready = await expect(transport, READY_PROMPT, timeout);
  if (!ready.matched) {
    throw new ProtocolError(
      `Receiver did not get ready: ${JSON.stringify(
        ready.data.toString("latin1")
      )}`,
      ready.data
    );
  }

  console.debug(`sending destination filename "${destination}"`);
  await write(
    transport,
    Buffer.concat([
      Buffer.from(destination, "utf-8"),
      Buffer.from([FILENAME_TERMINATOR]),
    ]),
    true
  );
  if (!(await readAck(transport))) {
    throw new ProtocolError("Board did not ack destination filename");
  }

  const chunks = splitIntoChunks(content, UPLOAD_CHUNK_SIZE);
  console.debug(`sending ${content.length} bytes in ${chunks.length} chunks`);

  for (const [index, chunk] of chunks.entries()) {
    await write(transport, buildChunkFrame(chunk), true);
    if (!(await readAck(transport))) {
      // whatever the receiver printed instead helps to find out what happened
      const { data } = await expect(transport, PROMPT, timeout);
      throw new ProtocolError(
        `Bad response to chunk ${index + 1}/${chunks.length}: ${data.toString(
          "hex"
        )}`,
        data
      );
    }

    progressCallback?.(chunks.length, index + 1, destination);
  }

  console.debug("sending zero block");
  await write(transport, TERMINATOR_FRAME, true);
  if (!(await readAck(transport))) {
    throw new ProtocolError("Board did not ack the end of file");
  }

  return { bytesWritten: content.length, chunks: chunks.length };
}

/**
 * Reads a file from the board chunk by chunk. Every chunk is its own
 * interpreter command, so no receiver is needed.
 *
 * @param transport The transport to the board.
 * @param remotePath The file on the board.
 * @param chunkSize The number of bytes requested per command.
 * @throws ParseError if a response cannot be split into its parts.
 * @throws TimeoutError if the board stops answering.
 */
export async function downloadFile(
  transport: Transport,
  remotePath: string,
  timeout = DEFAULT_TIMEOUT,
  chunkSize = DOWNLOAD_CHUNK_SIZE,
  progressCallback?: ProgressCallback
): Promise<Buffer> {
  const parts: Buffer[] = [];
  let bytesRead = 0;
  let size = 0;

  while (true) {
    const command = buildDownloadCommand(remotePath, bytesRead, chunkSize);
    const first = await exchange(transport, command, timeout);
    if (!first.matched) {
      throw new TimeoutError(`No prompt after '${command}'`, first.data);
    }
    let response = first.data;
    let chunk = parseDownloadChunk(response);
    size = chunk.size;

    // the prompt may be part of the binary payload, keep reading
    // until all expected bytes and the real prompt are there
    const expected = Math.max(0, Math.min(chunkSize, size - bytesRead));
    while (chunk.payload.length < expected + PROMPT.length) {
      const more = await expect(transport, PROMPT, timeout);
      if (!more.matched) {
        throw new TimeoutError(
          `Download of ${remotePath} stopped after ${chunk.payload.length} of ${expected} bytes`,
          Buffer.concat([response, more.data])
        );
      }
      response = Buffer.concat([response, more.data]);
      chunk = parseDownloadChunk(response);
    }

    parts.push(chunk.payload.subarray(0, chunkSize));
    bytesRead += chunkSize;
    progressCallback?.(
      Math.floor(size / chunkSize) + 1,
      bytesRead / chunkSize,
      remotePath
    );

    if (bytesRead > size) {
      break;
    }
  }

  return Buffer.concat(parts).subarray(0, size);
}

/**
 * Asks the board for the SHA1 digest of a file.
 *
 * @returns The lower case hex digest.
 */
export async function remoteSha1(
  transport: Transport,
  remotePath: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  const response = await executeCommand(
    transport,
    `shafile(${luaQuote(remotePath)})`,
    timeout
  );

  return parseHashResponse(response);
}

export function sha1Hex(content: Buffer): string {
  return createHash("sha1").update(content).digest("hex");
}

/**
 * Checks a freshly uploaded file against the content that was sent.
 *
 * @throws VerificationError if the content on the board differs.
 */
export async function verifyUpload(
  transport: Transport,
  destination: string,
  content: Buffer,
  mode: VerifyMode,
  timeout = DEFAULT_TIMEOUT
): Promise<void> {
  switch (mode) {
    case VerifyMode.none:
      return;

    case VerifyMode.raw: {
      console.info("Verifying...");
      const data = await downloadFile(transport, destination, timeout);
      if (!data.equals(content)) {
        throw new VerificationError(
          `Verification of ${destination} failed`,
          `${content.length} bytes`,
          `${data.length} bytes${data.length === content.length ? " (differing)" : ""}`
        );
      }

      return;
    }

    case VerifyMode.sha1: {
      const remote = await remoteSha1(transport, destination, timeout);
      console.info(`Remote SHA1: ${remote}`);
      const local = sha1Hex(content);
      console.info(`Local SHA1: ${local}`);
      if (remote !== local) {
        throw new VerificationError(
          `Verification of ${destination} failed`,
          local,
          remote
        );
      }

      return;
    }
  }
}
