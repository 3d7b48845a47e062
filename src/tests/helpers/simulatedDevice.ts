import { createHash } from "crypto";
import type { ModemSignals, Transport } from "../../transport.js";
import { ACK, PROMPT, READY_PROMPT, UPLOAD_CHUNK_SIZE } from "../../constants.js";
import { DEFAULT_BAUD_RATE } from "../../config.js";
import { parseChunkFrame } from "../../packetProcessing.js";

const NAK = 0x15;
const FRAME_SIZE = 2 + UPLOAD_CHUNK_SIZE;

const DOWNLOAD_LINE =
  /^file\.open\("(.*)"\) print\(file\.seek\("end", 0\)\) file\.seek\("set", (\d+)\) uart\.write\(0, file\.read\((\d+)\)\)file\.close\(\)$/;

type Mode = "line" | "name" | "frames";

export interface TranscriptEntry {
  direction: "write" | "read";
  data: Buffer;
}

/**
 * A NodeMCU board living in the test process. Implements {@link Transport}
 * and answers the lines the library sends the way the interpreter and the
 * resident receiver would.
 */
export class SimulatedDevice implements Transport {
  public readonly path = "/dev/ttyTEST0";
  public timeout = 1000;
  public baudRate = DEFAULT_BAUD_RATE;

  public readonly files = new Map<string, Buffer>();
  public readonly lines: string[] = [];
  public readonly transcript: TranscriptEntry[] = [];
  public readonly signals: ModemSignals[] = [];
  public closed = false;

  // behaviour switches
  public silent = false;
  public responseDelay = 0;
  public heap = 43120;
  public receiverLoaded = false;
  public ignoreBaudChange = false;
  public formatFails = false;
  public nackChunk?: number;
  public readonly shaOverrides = new Map<string, string>();
  // output printed for a line instead of executing it
  public readonly replies = new Map<string, string>();
  public downloadTrailer = Buffer.alloc(0);
  public restarts = 0;
  public uartBaudRate = DEFAULT_BAUD_RATE;

  private pending = Buffer.alloc(0);
  private waiters: Array<() => void> = [];
  private mode: Mode = "line";
  private lineBuffer = "";
  private binaryBuffer = Buffer.alloc(0);
  private blockDepth = 0;
  private receivingName = "";
  private receivedChunks: Buffer[] = [];
  private chunkCount = 0;

  /**
   * Makes bytes available to {@link read} right away.
   */
  public feed(data: Buffer | string): void {
    this.pending = Buffer.concat([
      this.pending,
      typeof data === "string" ? Buffer.from(data, "latin1") : data,
    ]);
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(wake => wake());
  }

  private respond(data: Buffer | string): void {
    setTimeout(() => this.feed(data), this.responseDelay);
  }

  public async read(size: number): Promise<Buffer> {
    if (this.pending.length === 0) {
      await new Promise<void>(resolve => {
        const wake = (): void => {
          clearTimeout(timer);
          resolve();
        };
        const timer = setTimeout(() => {
          this.waiters = this.waiters.filter(waiter => waiter !== wake);
          resolve();
        }, this.timeout);
        this.waiters.push(wake);
      });
    }

    const data = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(data.length);
    if (data.length > 0) {
      this.transcript.push({ direction: "read", data });
    }

    return data;
  }

  public async write(data: Buffer | string): Promise<void> {
    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    this.transcript.push({ direction: "write", data: bytes });

    switch (this.mode) {
      case "line":
        this.receiveText(bytes.toString("latin1"));
        break;
      case "name":
        this.receiveName(bytes);
        break;
      case "frames":
        this.receiveFrames(bytes);
        break;
    }
  }

  public async flush(): Promise<void> {
    // nothing is buffered
  }

  public async setBaudRate(baudRate: number): Promise<void> {
    this.baudRate = baudRate;
  }

  public async setSignals(signals: ModemSignals): Promise<void> {
    this.signals.push(signals);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Frames written to the device, in order.
   */
  public writtenFrames(): Buffer[] {
    return this.transcript
      .filter(
        entry => entry.direction === "write" && entry.data.length === FRAME_SIZE
      )
      .map(entry => entry.data);
  }

  private receiveText(text: string): void {
    this.lineBuffer += text;
    let newline = this.lineBuffer.indexOf("\n");
    while (newline !== -1 && this.mode === "line") {
      const line = this.lineBuffer.slice(0, newline);
      this.lineBuffer = this.lineBuffer.slice(newline + 1);
      this.handleLine(line);
      newline = this.lineBuffer.indexOf("\n");
    }
  }

  private handleLine(line: string): void {
    this.lines.push(line);
    if (this.silent) {
      return;
    }
    if (this.baudRate !== this.uartBaudRate) {
      // framing errors on a mismatched baud rate
      this.respond(Buffer.from([0xf8, 0x80, 0xfe]));
      return;
    }

    const echo = `${line}\r\n`;
    const reply = this.replies.get(line);
    if (reply !== undefined) {
      this.respond(echo + reply + PROMPT);
      return;
    }

    // function definitions are collected, not executed
    if (line.startsWith("function ") || line.endsWith(" then")) {
      this.blockDepth++;
    } else if (line === "end") {
      this.blockDepth--;
      if (this.blockDepth === 0 && this.lines.includes("function recv()")) {
        this.receiverLoaded = true;
      }
    }
    if (this.blockDepth > 0) {
      this.respond(echo + ">" + PROMPT);
      return;
    }

    if (line === "recv()" && this.receiverLoaded) {
      this.mode = "name";
      this.binaryBuffer = Buffer.alloc(0);
      // the receiver takes over the UART, no interpreter prompt follows
      this.respond(echo + READY_PROMPT);
      return;
    }

    this.respond(echo + this.execute(line) + PROMPT);
  }

  private execute(line: string): string {
    const uartSetup = /^uart\.setup\(0,(\d+),/.exec(line);
    if (uartSetup !== null) {
      if (!this.ignoreBaudChange) {
        this.uartBaudRate = parseInt(uartSetup[1], 10);
      }

      return "";
    }

    const download = DOWNLOAD_LINE.exec(line);
    if (download !== null) {
      const content = this.files.get(download[1]);
      if (content === undefined) {
        return "stdin:1: attempt to index a nil value\r\n";
      }
      const offset = parseInt(download[2], 10);
      const size = parseInt(download[3], 10);

      return Buffer.concat([
        Buffer.from(`${content.length}\r\n`, "latin1"),
        content.subarray(offset, offset + size),
        this.downloadTrailer,
      ]).toString("latin1");
    }

    const fileArgument = /^(file\.remove|dofile|node\.compile|shafile)\("(.*)"\)$/.exec(
      line
    );
    if (fileArgument !== null) {
      return this.executeFileCommand(fileArgument[1], fileArgument[2]);
    }

    const print = /^print\((\d+)\)$/.exec(line);
    if (print !== null) {
      return `${print[1]}\r\n`;
    }

    switch (line) {
      case 'print("%sync%");':
        return "%sync%\r\n";

      case "recv()":
        return "stdin:1: attempt to call global 'recv' (a nil value)\r\n";

      case "for key,value in pairs(file.list()) do print(key,value) end":
        return [...this.files.entries()]
          .map(([name, content]) => `${name}\t${content.length}\r\n`)
          .join("");

      case "print(node.heap())":
        return `${this.heap}\r\n`;

      case "file.format()":
        if (this.formatFails) {
          return "";
        }
        this.files.clear();

        return "format done\r\n";

      case "node.restart()":
        this.restarts++;
        this.uartBaudRate = DEFAULT_BAUD_RATE;
        this.receiverLoaded = false;

        return "\r\n\x00\xd8\xba NodeMCU 3.0.0 build 20240101\r\n";

      default:
        return "";
    }
  }

  private executeFileCommand(command: string, name: string): string {
    const content = this.files.get(name);

    switch (command) {
      case "file.remove":
        this.files.delete(name);

        return "";

      case "dofile":
        return content === undefined
          ? `lua: cannot open ${name}\r\n`
          : `running ${name}\r\n`;

      case "node.compile":
        if (content !== undefined) {
          this.files.set(name.replace(/\.lua$/, ".lc"), content);
        }

        return "";

      default:
        if (content === undefined) {
          return "stdin:1: bad argument #1 to 'read'\r\n";
        }

        return `${
          this.shaOverrides.get(name) ??
          createHash("sha1").update(content).digest("hex")
        }\r\n`;
    }
  }

  private receiveName(bytes: Buffer): void {
    this.binaryBuffer = Buffer.concat([this.binaryBuffer, bytes]);
    const end = this.binaryBuffer.indexOf(0);
    if (end === -1) {
      return;
    }

    this.receivingName = this.binaryBuffer.subarray(0, end).toString("utf-8");
    this.binaryBuffer = this.binaryBuffer.subarray(end + 1);
    this.receivedChunks = [];
    this.chunkCount = 0;
    this.mode = "frames";
    this.respond(Buffer.from([ACK]));
  }

  private receiveFrames(bytes: Buffer): void {
    this.binaryBuffer = Buffer.concat([this.binaryBuffer, bytes]);

    while (this.mode === "frames" && this.binaryBuffer.length >= FRAME_SIZE) {
      const frame = this.binaryBuffer.subarray(0, FRAME_SIZE);
      this.binaryBuffer = this.binaryBuffer.subarray(FRAME_SIZE);
      const payload = parseChunkFrame(frame);
      this.chunkCount++;

      if (payload === undefined || this.chunkCount === this.nackChunk) {
        this.mode = "line";
        this.respond(Buffer.concat([Buffer.from([NAK]), Buffer.from("\r\n> ")]));

        return;
      }
      if (payload.length === 0) {
        this.files.set(this.receivingName, Buffer.concat(this.receivedChunks));
        this.mode = "line";
      } else {
        this.receivedChunks.push(Buffer.from(payload));
      }

      this.respond(Buffer.from([ACK]));
    }
  }
}
