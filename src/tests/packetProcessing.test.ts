import { describe, expect, it } from "vitest";
import {
  TERMINATOR_FRAME,
  buildChunkFrame,
  buildDownloadCommand,
  findLuaError,
  luaQuote,
  parseChunkFrame,
  parseDownloadChunk,
  parseFileList,
  parseHashResponse,
  parseHeapResponse,
  prepareReceiverLines,
  splitIntoChunks,
} from "../packetProcessing.js";
import { ParseError } from "../errors.js";

function patternBytes(length: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => (i * 7) % 256));
}

describe("chunk frames", () => {
  it.each([0, 1, 44, 127, 128])(
    "builds a 130 byte frame for a %i byte payload",
    length => {
      const payload = Buffer.alloc(length, 0xab);
      const frame = buildChunkFrame(payload);

      expect(frame.length).toBe(130);
      expect(frame[0]).toBe(0x01);
      expect(frame[1]).toBe(length);
      expect(frame.subarray(2, 2 + length).equals(payload)).toBe(true);
      expect(frame.subarray(2 + length).every(byte => byte === 0x20)).toBe(
        true
      );
    }
  );

  it("rejects payloads larger than a chunk", () => {
    expect(() => buildChunkFrame(Buffer.alloc(129))).toThrow(RangeError);
  });

  it("keeps the terminator identical after other frames were built", () => {
    buildChunkFrame(Buffer.alloc(128, 0xff));
    buildChunkFrame(Buffer.from("print('hello')"));

    expect(
      TERMINATOR_FRAME.equals(
        Buffer.concat([Buffer.from([0x01, 0x00]), Buffer.alloc(128, 0x20)])
      )
    ).toBe(true);
    expect(buildChunkFrame(Buffer.alloc(0)).equals(TERMINATOR_FRAME)).toBe(
      true
    );
  });

  it.each([0, 1, 128, 129, 300, 1000])(
    "reassembles %i bytes from the frame length bytes",
    length => {
      const data = patternBytes(length);
      const frames = splitIntoChunks(data).map(buildChunkFrame);
      const payloads = frames.map(frame => parseChunkFrame(frame));

      expect(payloads.every(p => p !== undefined)).toBe(true);
      expect(
        Buffer.concat(payloads.filter((p): p is Buffer => p !== undefined))
          .equals(data)
      ).toBe(true);
    }
  );

  it("keeps trailing spaces of the payload", () => {
    const data = Buffer.from("x = 1   ");
    const payload = parseChunkFrame(buildChunkFrame(data));

    expect(payload?.toString()).toBe("x = 1   ");
  });

  it("rejects frames without the marker byte", () => {
    const frame = buildChunkFrame(Buffer.from("abc"));
    frame[0] = 0x02;

    expect(parseChunkFrame(frame)).toBeUndefined();
    expect(parseChunkFrame(Buffer.from([0x01]))).toBeUndefined();
  });

  it("splits 300 bytes into 128, 128 and 44 byte chunks", () => {
    expect(splitIntoChunks(patternBytes(300)).map(c => c.length)).toEqual([
      128, 128, 44,
    ]);
    expect(splitIntoChunks(Buffer.alloc(0))).toEqual([]);
    expect(() => splitIntoChunks(Buffer.alloc(4), 0)).toThrow(
      "Chunk size must be positive"
    );
  });
});

describe("command formatting", () => {
  it("quotes Lua strings", () => {
    expect(luaQuote("init.lua")).toBe('"init.lua"');
    expect(luaQuote('a"b\\c')).toBe('"a\\"b\\\\c"');
  });

  it("builds the download line", () => {
    expect(buildDownloadCommand("init.lua", 512)).toBe(
      'file.open("init.lua") print(file.seek("end", 0)) ' +
        'file.seek("set", 512) uart.write(0, file.read(256))file.close()'
    );
    expect(buildDownloadCommand("a.lua", 0, 64)).toContain("file.read(64)");
  });

  it("compacts the receiver script", () => {
    const script = "\r\nfunction f(a, b)\r\n  x = 9600\r\n\r\nend\r\n";

    expect(prepareReceiverLines(script, 115200)).toEqual([
      "function f(a,b)",
      "x=115200",
      "end",
    ]);
  });
});

describe("response parsing", () => {
  it("splits a download response into echo, size and payload", () => {
    const chunk = parseDownloadChunk(Buffer.from("cmd\r\n300\r\nabc> "));

    expect(chunk.echo).toBe("cmd");
    expect(chunk.size).toBe(300);
    expect(chunk.payload.toString()).toBe("abc> ");
  });

  it("keeps binary payload bytes including newlines", () => {
    const payload = Buffer.from([0x00, 0x0a, 0xff, 0x0d, 0x0a]);
    const chunk = parseDownloadChunk(
      Buffer.concat([Buffer.from("cmd\n5\n"), payload])
    );

    expect(chunk.payload.equals(payload)).toBe(true);
  });

  it("gives the first size bytes regardless of what follows", () => {
    for (const extra of ["", "> ", "garbage after> "]) {
      const chunk = parseDownloadChunk(Buffer.from(`cmd\n5\nhello${extra}`));

      expect(chunk.payload.subarray(0, chunk.size).toString()).toBe("hello");
    }
  });

  it("rejects download responses without a size line", () => {
    expect(() => parseDownloadChunk(Buffer.from("cmd only> "))).toThrow(
      ParseError
    );
    expect(() =>
      parseDownloadChunk(Buffer.from("cmd\r\nstdin:1: nil\r\n> "))
    ).toThrow("Download response contains no file size: 'stdin:1: nil'");
  });

  it("extracts the SHA1 digest from the second line", () => {
    const digest = "0123456789ABCDEF0123456789abcdef01234567";

    expect(parseHashResponse(`shafile("a")\r\n${digest}\r\n> `)).toBe(
      digest.toLowerCase()
    );
    expect(() => parseHashResponse('shafile("a")\r\nnot a digest\r\n> ')).toThrow(
      ParseError
    );
    expect(() => parseHashResponse("")).toThrow(ParseError);
  });

  it("parses the file listing", () => {
    const response =
      "for key,value in pairs(file.list()) do print(key,value) end\r\n" +
      "init.lua\t120\r\n" +
      "data.bin\t3\r\n" +
      "> ";

    expect(parseFileList(response)).toEqual([
      { path: "init.lua", size: 120 },
      { path: "data.bin", size: 3 },
    ]);
    expect(parseFileList("echo\r\n> ")).toEqual([]);
  });

  it("parses the heap size", () => {
    expect(parseHeapResponse("print(node.heap())\r\n43120\r\n> ")).toBe(43120);
    expect(() => parseHeapResponse("print(node.heap())\r\n> ")).toThrow(
      ParseError
    );
  });

  it("finds interpreter errors", () => {
    expect(
      findLuaError("x y\r\nstdin:1: syntax error near 'y'\r\n> ")
    ).toBe("stdin:1: syntax error near 'y'");
    expect(findLuaError("dofile(\"a\")\r\nlua: cannot open a\r\n> ")).toBe(
      "lua: cannot open a"
    );
    expect(findLuaError("print(1)\r\n1\r\n> ")).toBeUndefined();
    expect(
      findLuaError("dofile(\"init.lua\")\r\nlua: init.lua:3: attempt to call a nil value\r\n> ")
    ).toBe("lua: init.lua:3: attempt to call a nil value");
  });

  it("does not take printed text for an interpreter error", () => {
    expect(
      findLuaError('print("lua: x")\r\nlua: x\r\n> ')
    ).toBeUndefined();
    expect(
      findLuaError('print("stdin: ok")\r\nstdin: ok\r\n> ')
    ).toBeUndefined();
    expect(findLuaError("stdin:1: x\r\n1\r\n> ")).toBeUndefined();
  });
});
