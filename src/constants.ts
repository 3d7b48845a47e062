// Wire level constants of the interpreter protocol.

/** Prompt printed by the Lua interpreter when it waits for a line. */
export const PROMPT = "> ";
/** Prompt printed by the receiver when it waits for a file name. */
export const READY_PROMPT = "C> ";
/** Tag printed during the handshake to find the start of a clean prompt. */
export const SYNC_MARKER = "%sync%";

export const ACK = 0x06;
export const CHUNK_MARKER = 0x01;
export const FILENAME_TERMINATOR = 0x00;
export const PADDING_BYTE = 0x20;

export const UPLOAD_CHUNK_SIZE = 128;
export const DOWNLOAD_CHUNK_SIZE = 256;

// milliseconds each single read may block while expecting a pattern
export const POLL_TIMEOUT = 1;
// milliseconds to wait for a uart.setup line to leave the wire before
// switching the host side
export const BAUD_SWITCH_DELAY = 100;
