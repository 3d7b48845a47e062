import { ok } from "assert";
import type FileData from "./fileData.js";
import {
  CHUNK_MARKER,
  DOWNLOAD_CHUNK_SIZE,
  PADDING_BYTE,
  UPLOAD_CHUNK_SIZE,
} from "./constants.js";
import { ParseError } from "./errors.js";

// Contains utilities for parsing the output of commands from the board
// or to format command arguments and frames for usage on the board.

const NEWLINE = 0x0a;

/**
 * Builds one upload frame: marker, length, payload and space padding up to
 * the full chunk capacity.
 *
 * @param payload At most {@link UPLOAD_CHUNK_SIZE} bytes.
 * @throws RangeError if the payload is too large.
 */
export function buildChunkFrame(payload: Buffer): Buffer {
  if (payload.length > UPLOAD_CHUNK_SIZE) {
    throw new RangeError(
      `Chunk payload of ${payload.length} bytes exceeds ${UPLOAD_CHUNK_SIZE}`
    );
  }

  const frame = Buffer.alloc(2 + UPLOAD_CHUNK_SIZE, PADDING_BYTE);
  frame[0] = CHUNK_MARKER;
  frame[1] = payload.length;
  payload.copy(frame, 2);

  return frame;
}

/**
 * The zero length frame that tells the receiver the file is complete.
 */
export const TERMINATOR_FRAME = buildChunkFrame(Buffer.alloc(0));

/**
 * Extracts the payload of a frame by its length byte, the way the receiver does.
 *
 * @returns The payload or undefined if the frame is malformed.
 */
export function parseChunkFrame(frame: Buffer): Buffer | undefined {
  if (frame.length < 2 || frame[0] !== CHUNK_MARKER) {
    return undefined;
  }
  const length = frame[1];
  if (frame.length < 2 + length) {
    return undefined;
  }

  return frame.subarray(2, 2 + length);
}

/**
 * Splits data into consecutive chunks of at most `chunkSize` bytes.
 * Empty data gives no chunks.
 */
export function splitIntoChunks(
  data: Buffer,
  chunkSize = UPLOAD_CHUNK_SIZE
): Buffer[] {
  ok(chunkSize > 0, "Chunk size must be positive");

  const chunks: Buffer[] = [];
  for (let pos = 0; pos < data.length; pos += chunkSize) {
    chunks.push(data.subarray(pos, pos + chunkSize));
  }

  return chunks;
}

/**
 * Quotes a string as a double quoted Lua string literal.
 */
export function luaQuote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * The interpreter line that prints the size of a file and then writes
 * one chunk of it raw to the UART.
 */
export function buildDownloadCommand(
  remotePath: string,
  offset: number,
  chunkSize = DOWNLOAD_CHUNK_SIZE
): string {
  return (
    `file.open(${luaQuote(remotePath)}) print(file.seek("end", 0)) ` +
    `file.seek("set", ${offset}) uart.write(0, file.read(${chunkSize}))` +
    "file.close()"
  );
}

export interface DownloadChunk {
  /**
   * The echoed command line.
   */
  echo: string;
  /**
   * The total size of the remote file.
   */
  size: number;
  /**
   * Everything after the size line, including the trailing prompt.
   */
  payload: Buffer;
}

/**
 * Splits a download response into echo, size line and raw payload.
 *
 * @param response `<echo>\n<size>\n<payload>`
 * @throws ParseError if one of the parts is missing or the size is not a number.
 */
export function parseDownloadChunk(response: Buffer): DownloadChunk {
  const echoEnd = response.indexOf(NEWLINE);
  const sizeEnd = echoEnd === -1 ? -1 : response.indexOf(NEWLINE, echoEnd + 1);
  if (sizeEnd === -1) {
    throw new ParseError("Malformed download response", response);
  }

  const sizeLine = response
    .subarray(echoEnd + 1, sizeEnd)
    .toString("latin1")
    .trim();
  if (!/^\d+$/.test(sizeLine)) {
    throw new ParseError(
      `Download response contains no file size: '${sizeLine}'`,
      response
    );
  }

  return {
    echo: response.subarray(0, echoEnd).toString("latin1").trimEnd(),
    size: parseInt(sizeLine, 10),
    payload: response.subarray(sizeEnd + 1),
  };
}

/**
 * Splits a text response into lines, dropping carriage returns.
 */
export function responseLines(response: string): string[] {
  return response.replaceAll("\r", "").split("\n");
}

/**
 * Extracts the digest printed by `shafile()`, the second line of the response.
 *
 * @returns The lower case hex digest.
 * @throws ParseError if the second line is not a SHA1 hex digest.
 */
export function parseHashResponse(response: string): string {
  const line = responseLines(response)[1]?.trim() ?? "";
  if (!/^[0-9a-fA-F]{40}$/.test(line)) {
    throw new ParseError(`Response contains no SHA1 digest: '${line}'`);
  }

  return line.toLowerCase();
}

/**
 * Parses the output of the file listing command, one `name<TAB>size` per line.
 * The echo line and the prompt are skipped.
 */
export function parseFileList(response: string): FileData[] {
  const files: FileData[] = [];
  for (const line of responseLines(response)) {
    const match = /^(.+)\t(\d+)$/.exec(line);
    if (match === null) {
      continue;
    }

    files.push({ path: match[1], size: parseInt(match[2], 10) });
  }

  return files;
}

/**
 * Extracts the number printed by `print(node.heap())`.
 *
 * @throws ParseError if no line of the response is a plain number.
 */
export function parseHeapResponse(response: string): number {
  const line = responseLines(response)
    .map(l => l.trim())
    .find(l => /^\d+$/.test(l));
  if (line === undefined) {
    throw new ParseError("Response contains no heap size");
  }

  return parseInt(line, 10);
}

// stdin:1: syntax error, lua: cannot open x, lua: init.lua:3: attempt ...
const LUA_ERROR = /^(stdin:\d+: |lua: (cannot open |[^\s:]+:\d+: ))/;

/**
 * Detects error messages of the Lua interpreter in a response.
 * The first line is the echo of the command and is skipped.
 *
 * @returns The first error line or undefined.
 */
export function findLuaError(response: string): string | undefined {
  return responseLines(response)
    .slice(1)
    .find(line => LUA_ERROR.test(line.trim()));
}

/**
 * Prepares the receiver script for sending: the default baud rate is
 * replaced with the session baud rate and every line is compacted.
 *
 * @returns The non empty lines to send.
 */
export function prepareReceiverLines(
  script: string,
  baudRate: number
): string[] {
  return script
    .replaceAll("9600", baudRate.toString())
    .replaceAll("\r", "")
    .split("\n")
    .map(line => line.trim().replaceAll(", ", ",").replaceAll(" = ", "="))
    .filter(line => line.length > 0);
}
