/**
 * Target address handling
 */

import * as net from 'node:net';
import { formatHostPort, logger, errorMessage } from '@proxysock/tunnel';
import type { AddressTarget, ConnectTarget, ReverseLookup } from './types.js';

export function isAddressTarget(target: ConnectTarget): target is AddressTarget {
  return 'address' in target;
}

/**
 * The host the tunnel is opened to: the name, or the numeric address as given
 */
export function tunnelHost(target: ConnectTarget): string {
  return isAddressTarget(target) ? target.address : target.host;
}

export function describeTarget(target: ConnectTarget): string {
  return formatHostPort(tunnelHost(target), target.port);
}

export function isNumericAddress(value: string): boolean {
  return net.isIP(value) !== 0;
}

/**
 * Hostname presented to the TLS layer for a target.
 *
 * For an address target this performs a reverse DNS lookup, a network round
 * trip made as a side effect of connecting. The first name returned wins;
 * when the lookup fails or finds nothing the address literal is used.
 */
export async function resolveTlsHostname(target: ConnectTarget, reverseLookup: ReverseLookup): Promise<string> {
  if (!isAddressTarget(target)) return target.host;

  try {
    const names = await reverseLookup(target.address);
    const name = names.find((candidate) => candidate.length > 0);
    if (name) {
      logger.debug(`[Proxy] Reverse lookup of ${target.address} -> ${name}`);
      return name;
    }
    logger.debug(`[Proxy] Reverse lookup of ${target.address} returned no names`);
  } catch (err) {
    logger.debug(`[Proxy] Reverse lookup of ${target.address} failed: ${errorMessage(err)}`);
  }
  return target.address;
}
