import { readFile } from "fs/promises";
import { basename } from "path";
import type { Transport } from "./transport.js";
import type FileData from "./fileData.js";
import { DEFAULT_TIMEOUT } from "./config.js";
import { PROMPT } from "./constants.js";
import { ProtocolError, TimeoutError } from "./errors.js";
import {
  luaQuote,
  parseFileList,
  parseHeapResponse,
  responseLines,
} from "./packetProcessing.js";
import { exchange, executeCommand } from "./serialHelper.js";

// Thin wrappers around single interpreter commands. Each one logs what the
// board answered and returns it.

export async function fileList(
  transport: Transport,
  timeout = DEFAULT_TIMEOUT
): Promise<FileData[]> {
  console.info("Listing files");
  const response = await executeCommand(
    transport,
    "for key,value in pairs(file.list()) do print(key,value) end",
    timeout
  );
  console.info(response);

  return parseFileList(response);
}

export async function fileRemove(
  transport: Transport,
  path: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info(`Remove ${path}`);
  const response = await executeCommand(
    transport,
    `file.remove(${luaQuote(path)})`,
    timeout
  );
  console.info(response);

  return response;
}

/**
 * Runs a Lua file stored on the board.
 */
export async function fileDo(
  transport: Transport,
  path: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info(`Executing ${path}`);
  const response = await executeCommand(
    transport,
    `dofile(${luaQuote(path)})`,
    timeout
  );
  console.info(response);

  return response;
}

/**
 * Compiles a Lua file on the board into bytecode (.lc).
 */
export async function fileCompile(
  transport: Transport,
  path: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info(`Compile ${path}`);
  const response = await executeCommand(
    transport,
    `node.compile(${luaQuote(path)})`,
    timeout
  );
  console.info(response);

  return response;
}

/**
 * Formats the flash filesystem. This removes every file, the receiver
 * routines stay in memory.
 *
 * @throws ProtocolError if the board does not confirm the format.
 */
export async function fileFormat(
  transport: Transport,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info("Formating...");
  const response = await executeCommand(transport, "file.format()", timeout);
  if (!response.includes("format done")) {
    console.error(response);
    throw new ProtocolError(
      "Board did not confirm the format",
      Buffer.from(response, "latin1")
    );
  }
  console.info(response);

  return response;
}

/**
 * @returns The free heap of the board in bytes.
 */
export async function nodeHeap(
  transport: Transport,
  timeout = DEFAULT_TIMEOUT
): Promise<number> {
  console.info("Heap");
  const response = await executeCommand(
    transport,
    "print(node.heap())",
    timeout
  );
  console.info(response);

  return parseHeapResponse(response);
}

/**
 * Restarts the board. The response contains whatever the board printed
 * while rebooting, the interpreter state afterwards is unknown.
 */
export async function nodeRestart(
  transport: Transport,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info("Restart");
  const { data } = await exchange(transport, "node.restart()", timeout);
  const response = data.toString("latin1");
  console.info(response);

  return response;
}

/**
 * Sends a local Lua file line by line to the interpreter and logs the output.
 *
 * @returns Echoes and output of all lines, the final prompt excluded.
 */
export async function execLocalFile(
  transport: Transport,
  localPath: string,
  timeout = DEFAULT_TIMEOUT
): Promise<string> {
  console.info(`Execute ${basename(localPath)}`);
  const source = await readFile(localPath, "utf-8");

  const sourceLines = responseLines(source);
  if (sourceLines.at(-1) === "") {
    sourceLines.pop();
  }

  const output: string[] = [];
  let pending = PROMPT;
  for (const line of sourceLines) {
    const { data, matched } = await exchange(transport, line, timeout);
    if (!matched) {
      throw new TimeoutError(`No prompt after ${JSON.stringify(line)}`, data);
    }
    const lines = responseLines(pending + data.toString("latin1"));
    // the last line is the prompt, it is logged with the next response
    pending = lines.pop() ?? "";
    for (const l of lines) {
      console.info(l);
      output.push(l);
    }
  }
  console.info(pending);

  return output.join("\n");
}
