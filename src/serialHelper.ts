import type { Transport } from "./transport.js";
import {
  ACK,
  BAUD_SWITCH_DELAY,
  POLL_TIMEOUT,
  PROMPT,
  SYNC_MARKER,
} from "./constants.js";
import { DEFAULT_BAUD_RATE, DEFAULT_TIMEOUT } from "./config.js";
import { ParseError, SyncError, TimeoutError } from "./errors.js";
import { findLuaError } from "./packetProcessing.js";

/**
 * The bytes read by one {@link expect} call.
 */
export interface ExpectResult {
  data: Buffer;
  /**
   * True if the data ends with the expected pattern,
   * false if the deadline passed first.
   */
  matched: boolean;
}

function ensureBuffer(data: Buffer | string): Buffer {
  return typeof data === "string" ? Buffer.from(data, "utf-8") : data;
}

function endsWith(data: Buffer, suffix: Buffer): boolean {
  return (
    data.length >= suffix.length && data.subarray(-suffix.length).equals(suffix)
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reads from the transport until the data read so far ends with the given
 * pattern or the timeout expires.
 *
 * Reads one byte at a time so nothing following the pattern is consumed.
 * The read timeout of the transport is lowered while polling and restored
 * afterwards.
 *
 * @param transport The transport to read from.
 * @param pattern The suffix to look for.
 * @param timeout The deadline in milliseconds.
 * @returns Everything that was read, whether or not the pattern was found.
 */
export async function expect(
  transport: Transport,
  pattern: string | Buffer = PROMPT,
  timeout = DEFAULT_TIMEOUT
): Promise<ExpectResult> {
  const expectedSuffix = ensureBuffer(pattern);
  const previousTimeout = transport.timeout;
  transport.timeout = POLL_TIMEOUT;

  const end = Date.now() + timeout;
  let data = Buffer.alloc(0);
  let matched = endsWith(data, expectedSuffix);

  try {
    while (!matched && Date.now() <= end) {
      const newData = await transport.read(1);
      if (newData.length > 0) {
        data = Buffer.concat([data, newData]);
        matched = endsWith(data, expectedSuffix);
      }
    }
  } finally {
    transport.timeout = previousTimeout;
  }

  console.debug(
    `expect ${matched ? "matched" : "timed out"}: ${JSON.stringify(
      data.toString("latin1")
    )}`
  );

  return { data, matched };
}

/**
 * Writes raw data and waits until it has been transmitted.
 */
export async function write(
  transport: Transport,
  data: Buffer | string,
  binary = false
): Promise<void> {
  if (binary && data instanceof Buffer) {
    console.debug(`write binary: ${data.toString("hex")}`);
  } else {
    console.debug(`write: ${JSON.stringify(data.toString())}`);
  }

  await transport.write(data);
  await transport.flush();
}

export async function writeLine(
  transport: Transport,
  line: string
): Promise<void> {
  await write(transport, line + "\n");
}

/**
 * Sends a line and reads the response up to and including the next prompt.
 *
 * The response contains the echo of the line, its output and the prompt.
 *
 * @returns The response, check `matched` to see if the prompt arrived.
 */
export async function exchange(
  transport: Transport,
  line: string,
  timeout = DEFAULT_TIMEOUT
): Promise<ExpectResult> {
  await writeLine(transport, line);

  return expect(transport, PROMPT, timeout);
}

/**
 * Sends a line and returns the response as text.
 *
 * @throws TimeoutError if the prompt did not come back.
 * @throws ParseError if the interpreter reported an error.
 */
export async function executeCommand(
  transport: Transport,
  line: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  const { data, matched } = await exchange(transport, line, timeout);
  if (!matched) {
    throw new TimeoutError(`No prompt after '${line}'`, data);
  }

  const response = data.toString("latin1");
  const luaError = findLuaError(response);
  if (luaError !== undefined) {
    throw new ParseError(`Board reported an error: ${luaError}`, data);
  }

  return response;
}

/**
 * Reads a single byte with the transport timeout.
 *
 * @returns True if it was an ACK.
 */
export async function readAck(transport: Transport): Promise<boolean> {
  const data = await transport.read(1);
  console.debug(`ack read: ${data.toString("hex") || "<none>"}`);

  return data.length === 1 && data[0] === ACK;
}

/**
 * Gets the interpreter into a known state: flushes whatever is pending and
 * waits for the sync marker followed by a fresh prompt.
 *
 * @param transport The transport to the board.
 * @param timeout Bounds the whole handshake, in milliseconds.
 * @throws SyncError if the marker is not seen in time.
 */
export async function synchronize(
  transport: Transport,
  timeout = DEFAULT_TIMEOUT
): Promise<void> {
  const deadline = Date.now() + timeout;
  const remaining = (): number => Math.max(0, deadline - Date.now());

  // get a defined state, the response may contain a boot banner
  await exchange(transport, ";", remaining());

  await writeLine(transport, `print("${SYNC_MARKER}");`);
  const { data, matched } = await expect(
    transport,
    `${SYNC_MARKER}\r\n${PROMPT}`,
    remaining()
  );
  if (!matched) {
    throw new SyncError("Board did not answer the sync request", data);
  }
}

/**
 * The line that reconfigures the UART of the board.
 */
export function uartSetupCommand(baudRate: number): string {
  return `uart.setup(0,${baudRate},8,0,1,1)`;
}

/**
 * Switches the board and then the host to another baud rate and verifies
 * the link at the new speed.
 *
 * @throws SyncError if the board does not answer at the new speed.
 */
export async function changeBaudRate(
  transport: Transport,
  baudRate: number,
  timeout = DEFAULT_TIMEOUT
): Promise<void> {
  console.info(`Changing communication to ${baudRate} baud`);
  await writeLine(transport, uartSetupCommand(baudRate));

  // switching before the line has left the wire truncates it
  await sleep(BAUD_SWITCH_DELAY);
  await transport.setBaudRate(baudRate);

  // settle framing, then make sure the board really talks at this speed
  await exchange(transport, "", timeout);
  await exchange(transport, "", timeout);
  await synchronize(transport, timeout);
}

/**
 * Sends the board back to the boot baud rate. The host side is left as is,
 * the port is closed right after.
 */
export async function restoreBaudRate(transport: Transport): Promise<void> {
  await writeLine(transport, uartSetupCommand(DEFAULT_BAUD_RATE));
}
