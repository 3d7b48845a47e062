// the firmware always boots with its UART at this rate
export const DEFAULT_BAUD_RATE = 9600;
// milliseconds
export const DEFAULT_TIMEOUT = 5000;

/**
 * How an uploaded file is checked after the transfer.
 */
export enum VerifyMode {
  none = "none",
  // download the file again and compare byte by byte
  raw = "raw",
  // compare a SHA1 digest computed on the board with a local one
  sha1 = "sha1",
}

export interface NodeMcuConfig {
  /**
   * The serial port path (e.g. /dev/ttyUSB0 or COM3).
   */
  port: string;
  /**
   * The baud rate to switch to after the handshake.
   */
  baudRate: number;
  /**
   * The response timeout in milliseconds.
   */
  timeout: number;
  verify: VerifyMode;
}

export type NodeMcuConfigOptions = Pick<NodeMcuConfig, "port"> &
  Partial<Omit<NodeMcuConfig, "port">>;

/**
 * Returns the usual serial port path of a USB-UART bridge for the given platform.
 *
 * @param platform Defaults to the current platform.
 */
export function defaultPort(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case "win32":
      return "COM1";
    case "darwin":
      return "/dev/tty.SLAB_USBtoUART";
    default:
      return "/dev/ttyUSB0";
  }
}

/**
 * Fills in defaults and validates a configuration.
 *
 * @throws RangeError if a value is out of range.
 */
export function resolveConfig(options: NodeMcuConfigOptions): NodeMcuConfig {
  const config: NodeMcuConfig = {
    port: options.port,
    baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    verify: options.verify ?? VerifyMode.none,
  };

  if (config.port.trim() === "") {
    throw new RangeError("Serial port path must not be empty");
  }
  if (!Number.isInteger(config.baudRate) || config.baudRate <= 0) {
    throw new RangeError(`Invalid baud rate: ${config.baudRate}`);
  }
  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new RangeError(`Invalid timeout: ${config.timeout}`);
  }
  if (!Object.values(VerifyMode).includes(config.verify)) {
    throw new RangeError(`Invalid verify mode: ${String(config.verify)}`);
  }

  return config;
}
