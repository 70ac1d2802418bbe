/**
 * Serial byte source/sink used by the link session.
 *
 * `SerialTransport` opens handles and enumerates ports; the default
 * implementation sits on the `serialport` package. Tests substitute an
 * in-process transport with the same shape.
 *
 * @module transport/serial_transport
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import { scan_ports, type PortInfo } from './port_scanner';

/**
 * Events emitted by a {@link SerialHandle}.
 *
 * - `'data'`: Raw bytes as received.
 * - `'error'`: I/O error on the port.
 * - `'close'`: Port closed, by either side.
 */
export interface SerialHandleEvents {
  data: (chunk: Uint8Array) => void;
  error: (err: Error) => void;
  close: () => void;
}

/** One open serial connection. */
export interface SerialHandle {
  readonly path: string;
  on<E extends keyof SerialHandleEvents>(event: E, listener: SerialHandleEvents[E]): unknown;
  removeAllListeners(): unknown;
  /** Resolves once the bytes are handed to the OS; rejects on I/O error. */
  write(data: Uint8Array): Promise<void>;
  /** Close the port. Safe to call on a closed handle. */
  close(): Promise<void>;
  is_open(): boolean;
}

export interface SerialTransport {
  open(path: string, baud: number): Promise<SerialHandle>;
  list_ports(): Promise<PortInfo[]>;
}

// ---------------------------------------------------------------------------
// serialport-backed implementation
// ---------------------------------------------------------------------------

/** {@link SerialHandle} over a `serialport` instance. */
export class SerialPortHandle extends EventEmitter implements SerialHandle {
  readonly path: string;
  private port: SerialPort | null;

  constructor(port: SerialPort, path: string) {
    super();
    this.path = path;
    this.port = port;

    port.on('data', (buf: Buffer) => {
      this.emit('data', new Uint8Array(buf));
    });
    port.on('error', (err: Error) => {
      this.emit('error', err);
    });
    port.on('close', () => {
      // Guard: a close that arrives after close() has already detached
      // the port must not be reported twice.
      if (this.port === port) {
        this.port = null;
        port.removeAllListeners();
        this.emit('close');
      }
    });
  }

  is_open(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  write(data: Uint8Array): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      return Promise.reject(new Error(`SerialPortHandle: ${this.path} is not open`));
    }

    return new Promise<void>((resolve, reject) => {
      port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(new Error(`SerialPortHandle: write to ${this.path} failed: ${err.message}`));
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    const old_port = this.port;
    if (!old_port) {
      return Promise.resolve();
    }

    // Detach before closing so the asynchronous 'close' from the old port
    // is not reported as an unexpected loss of link.
    this.port = null;
    old_port.removeAllListeners();

    if (!old_port.isOpen) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      old_port.close((err) => {
        if (err) {
          reject(new Error(`SerialPortHandle: error closing ${this.path}: ${err.message}`));
          return;
        }
        resolve();
      });
    });
  }
}

/** Default transport: real serial ports through `serialport`. */
export class NodeSerialTransport implements SerialTransport {
  open(path: string, baud: number): Promise<SerialHandle> {
    return new Promise<SerialHandle>((resolve, reject) => {
      try {
        const port = new SerialPort({
          path,
          baudRate: baud,
          autoOpen: false
        });

        port.open((err) => {
          if (err) {
            port.removeAllListeners();
            reject(new Error(`NodeSerialTransport: failed to open ${path}: ${err.message}`));
            return;
          }
          resolve(new SerialPortHandle(port, path));
        });
      } catch (err) {
        reject(
          new Error(
            `NodeSerialTransport: failed to create serial port: ${err instanceof Error ? err.message : String(err)}`
          )
        );
      }
    });
  }

  list_ports(): Promise<PortInfo[]> {
    return scan_ports();
  }
}
