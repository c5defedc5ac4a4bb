import { ProtocolError } from '../errors.js';

export type PortRange = { min: number; max: number };

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE';
}

/**
 * Tries each port of the range in order and returns the one `listen` accepted.
 * Only `EADDRINUSE` moves on to the next port.
 */
export async function listenOnPortRange(
  listen: (port: number) => Promise<unknown>,
  range: PortRange,
  onBusy?: (port: number) => void,
): Promise<number> {
  for (let port = range.min; port <= range.max; port++) {
    try {
      await listen(port);
      return port;
    } catch (e) {
      if (!isAddressInUse(e)) throw e;
      onBusy?.(port);
    }
  }

  throw new ProtocolError('ERR_008', `Cannot bind to any port in range ${range.min}-${range.max}`);
}
