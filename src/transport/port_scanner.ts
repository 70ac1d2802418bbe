/**
 * Serial port enumeration.
 *
 * @module transport/port_scanner
 */

import { SerialPort } from 'serialport';
import type { Logger } from 'pino';
import { module_logger } from '../logger';

/** Metadata for one serial port. */
export interface PortInfo {
  /** OS device path (COM3, /dev/ttyUSB0, ...). */
  path: string;
  vid?: string;
  pid?: string;
  manufacturer?: string;
  /** "manufacturer (path)", or just the path. */
  label: string;
}

/**
 * List the serial ports the OS reports.
 *
 * Enumeration failures (missing permissions, no driver) are logged and
 * yield an empty list, which the reconnect loop treats as a failed attempt.
 */
export async function scan_ports(logger: Logger = module_logger('port_scanner')): Promise<PortInfo[]> {
  try {
    const raw_ports = await SerialPort.list();

    return raw_ports.map((p) => {
      const manufacturer = p.manufacturer ?? undefined;
      return {
        path: p.path,
        vid: p.vendorId ?? undefined,
        pid: p.productId ?? undefined,
        manufacturer,
        label: manufacturer ? `${manufacturer} (${p.path})` : p.path
      };
    });
  } catch (err) {
    logger.warn({ err }, 'serial port enumeration failed');
    return [];
  }
}
