/**
 * In-process serial transport for session tests.
 *
 * Ports are plain path strings; which of them open is controlled per test.
 *
 * @module test/fixtures/fake_transport
 */

import { EventEmitter } from 'events';
import type { SerialHandle, SerialTransport } from '../../src/transport/serial_transport';
import type { PortInfo } from '../../src/transport/port_scanner';

export class FakeHandle extends EventEmitter implements SerialHandle {
  readonly path: string;
  readonly written: Uint8Array[] = [];
  open = true;
  /** When set, writes reject with this message. */
  write_error: string | null = null;
  /** Resolvers for writes held back with `hold_writes`. */
  private held: Array<() => void> = [];
  hold_writes = false;

  constructor(path: string) {
    super();
    this.path = path;
  }

  is_open(): boolean {
    return this.open;
  }

  write(data: Uint8Array): Promise<void> {
    if (this.write_error !== null) {
      return Promise.reject(new Error(this.write_error));
    }
    this.written.push(Uint8Array.from(data));
    if (this.hold_writes) {
      return new Promise<void>((resolve) => {
        this.held.push(resolve);
      });
    }
    return Promise.resolve();
  }

  /** Complete the oldest held write. */
  release_write(): void {
    const next = this.held.shift();
    if (next) {
      next();
    }
  }

  close(): Promise<void> {
    this.open = false;
    return Promise.resolve();
  }

  /** Deliver bytes as if read from the wire. */
  receive(bytes: ArrayLike<number>): void {
    this.emit('data', Uint8Array.from(bytes));
  }

  /** Simulate the device going away. */
  unplug(): void {
    this.open = false;
    this.emit('close');
  }
}

export class FakeTransport implements SerialTransport {
  /** Paths returned by list_ports(). */
  ports: string[] = [];
  /** Paths that open successfully. */
  openable = new Set<string>();
  readonly open_calls: string[] = [];
  list_calls = 0;
  readonly handles: FakeHandle[] = [];

  open(path: string, _baud: number): Promise<SerialHandle> {
    this.open_calls.push(path);
    if (!this.openable.has(path)) {
      return Promise.reject(new Error(`cannot open ${path}`));
    }
    const handle = new FakeHandle(path);
    this.handles.push(handle);
    return Promise.resolve(handle);
  }

  list_ports(): Promise<PortInfo[]> {
    this.list_calls++;
    return Promise.resolve(this.ports.map((path) => ({ path, label: path })));
  }

  /** Most recently opened handle. */
  last_handle(): FakeHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) {
      throw new Error('no handle opened yet');
    }
    return handle;
  }
}
