import { SerialPort, type SerialPortMock } from "serialport";

/**
 * The modem control outputs of a serial port.
 */
export interface ModemSignals {
  rts?: boolean;
  dtr?: boolean;
}

/**
 * A duplex byte stream to the board.
 *
 * Everything above this interface only ever sees raw bytes, the port
 * itself is opened by the caller.
 */
export interface Transport {
  readonly path: string;
  readonly baudRate: number;
  /**
   * How long {@link Transport.read} waits for data, in milliseconds.
   */
  timeout: number;

  /**
   * Reads up to `size` bytes. Waits at most `timeout` milliseconds for
   * them to arrive and returns whatever is available then (possibly nothing).
   */
  read(size: number): Promise<Buffer>;
  write(data: Buffer | string): Promise<void>;
  /**
   * Waits until all written data has been transmitted.
   */
  flush(): Promise<void>;
  setBaudRate(baudRate: number): Promise<void>;
  setSignals(signals: ModemSignals): Promise<void>;
  close(): Promise<void>;
}

type NodeSerialPort = SerialPort | SerialPortMock;

/**
 * {@link Transport} on top of a node-serialport stream. The stream is used in
 * paused mode, bytes are pulled with `read()` instead of `data` events.
 */
export class SerialTransport implements Transport {
  public timeout: number;

  constructor(private readonly port: NodeSerialPort, timeout: number) {
    this.timeout = timeout;
  }

  public get path(): string {
    return this.port.path;
  }

  public get baudRate(): number {
    return this.port.baudRate;
  }

  public get isOpen(): boolean {
    return this.port.isOpen;
  }

  public async open(): Promise<void> {
    if (this.port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.port.open(error => (error ? reject(error) : resolve()));
    });
  }

  public async read(size: number): Promise<Buffer> {
    if (this.port.readableLength >= size) {
      return this.take(size);
    }

    return new Promise(resolve => {
      const finish = (): void => {
        clearTimeout(timer);
        this.port.off("readable", onReadable);
        resolve(this.take(size));
      };
      const onReadable = (): void => {
        if (this.port.readableLength >= size) {
          finish();
        }
      };

      const timer = setTimeout(finish, this.timeout);
      this.port.on("readable", onReadable);
    });
  }

  private take(size: number): Buffer {
    const available = Math.min(size, this.port.readableLength);
    if (available === 0) {
      return Buffer.alloc(0);
    }
    const data: unknown = this.port.read(available);

    return Buffer.isBuffer(data) ? data : Buffer.alloc(0);
  }

  public async write(data: Buffer | string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.write(data, error => (error ? reject(error) : resolve()));
    });
  }

  public async flush(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.drain(error => (error ? reject(error) : resolve()));
    });
  }

  public async setBaudRate(baudRate: number): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.update({ baudRate }, error =>
        error ? reject(error) : resolve()
      );
    });
  }

  public async setSignals(signals: ModemSignals): Promise<void> {
    // only pass what is set, the bindings fill missing keys with their defaults
    const options: ModemSignals = {};
    if (signals.rts !== undefined) {
      options.rts = signals.rts;
    }
    if (signals.dtr !== undefined) {
      options.dtr = signals.dtr;
    }

    await new Promise<void>((resolve, reject) => {
      this.port.set(options, error => (error ? reject(error) : resolve()));
    });
  }

  public async close(): Promise<void> {
    if (!this.port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.port.close(error => (error ? reject(error) : resolve()));
    });
  }
}

/**
 * Opens a serial port and wraps it into a {@link Transport}.
 *
 * @param path The port to open.
 * @param baudRate The initial baud rate.
 * @param timeout The read timeout in milliseconds.
 */
export async function openSerialTransport(
  path: string,
  baudRate: number,
  timeout: number
): Promise<SerialTransport> {
  const transport = new SerialTransport(
    new SerialPort({ path, baudRate, autoOpen: false, lock: true }),
    timeout
  );
  await transport.open();

  return transport;
}
