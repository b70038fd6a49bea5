/**
 * Passive mode negotiation
 *
 * The server advertises the data port in its PASV reply:
 *   227 Entering Passive Mode (h1,h2,h3,h4,p1,p2)
 * which means host h1.h2.h3.h4 and port p1 * 256 + p2.
 */

import type { PassiveAddress, Transport, TransportFactory } from '../types/index.js';
import { ConnectionError, ProtocolParseError } from '../core/errors.js';
import { ResponseCode, hasCode } from './codes.js';

export interface PassiveControl {
  sendCommand(command: string): Promise<void>;
  readLine(): Promise<string | null>;
}

export function parsePassiveReply(reply: string): PassiveAddress {
  const match = reply.match(/\(([^)]*)\)/);
  if (!match) {
    throw new ProtocolParseError(`PASV reply has no address payload: ${reply}`, { reply });
  }

  const fields = match[1].split(',').map((field) => field.trim());
  if (fields.length !== 6) {
    throw new ProtocolParseError(
      `PASV reply must carry 6 fields, got ${fields.length}: ${reply}`,
      { reply }
    );
  }

  const numbers = fields.map((field) => (/^\d+$/.test(field) ? Number(field) : NaN));
  if (numbers.some((n) => Number.isNaN(n) || n > 255)) {
    throw new ProtocolParseError(`PASV reply has invalid fields: ${reply}`, { reply });
  }

  const [h1, h2, h3, h4, p1, p2] = numbers;
  return {
    host: `${h1}.${h2}.${h3}.${h4}`,
    port: p1 * 256 + p2,
  };
}

/**
 * Ask the server for a passive data connection and open it.
 *
 * Resolves `null` when the server declines (anything but 227); callers treat
 * that as an empty listing.
 */
export async function openDataChannel(
  control: PassiveControl,
  transportFactory: TransportFactory
): Promise<Transport | null> {
  await control.sendCommand('PASV');
  const reply = await control.readLine();

  if (reply === null || !hasCode(reply, ResponseCode.ENTERING_PASSIVE)) {
    return null;
  }

  const { host, port } = parsePassiveReply(reply);

  try {
    return await transportFactory(host, port);
  } catch (error) {
    if (error instanceof ConnectionError) throw error;
    throw new ConnectionError(`Could not open data connection to ${host}:${port}`, {
      host,
      port,
      cause: error,
    });
  }
}
