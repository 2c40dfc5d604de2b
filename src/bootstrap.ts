/**
 * Wiring of client and server onto the overlay transport
 *
 * Overlay peers address each other by the SHA-256 of their overlay
 * destination string, so a client reaches the server through the hash of
 * the server's destination, not through its identity address.
 */

import { ShellClient } from './client/client.js';
import { ClientConfig, ServerConfig } from './config.js';
import { bytesToHex } from './crypto/utils.js';
import { ConfigError } from './error.js';
import { Output, SilentOutput } from './output.js';
import { SamClient } from './sam/client.js';
import { ShellServer } from './server/server.js';
import { OverlayTransport } from './transport/overlay.js';
import { RouterBootstrap, resolveControlAddress } from './transport/router.js';

export interface OverlayBootstrapOptions {
  /** Embedded router; its control endpoint replaces config.controlAddress */
  router?: RouterBootstrap;
  /** Already-connected control client; skips endpoint resolution */
  samClient?: SamClient;
  sessionId?: string;
  output?: Output;
}

export interface OverlayServer {
  server: ShellServer;
  transport: OverlayTransport;
  /** Hex address clients put in serverDestination */
  overlayAddress: string;
}

export interface OverlayClient {
  client: ShellClient;
  transport: OverlayTransport;
}

export async function createOverlayServer(
  config: ServerConfig,
  options: OverlayBootstrapOptions = {},
): Promise<OverlayServer> {
  const output = options.output ?? new SilentOutput();
  const transport = await openTransport(config.controlAddress, options, output);
  const overlayAddress = bytesToHex(transport.localAddress());

  await output.info(`Server overlay destination: ${transport.localDestination()}`);
  await output.info(`Server overlay address: ${overlayAddress}`);

  return { server: new ShellServer(config, transport, output), transport, overlayAddress };
}

/**
 * Throws ConfigError unless serverOverlayDestination is set and hashes to
 * serverDestination
 */
export async function createOverlayClient(
  config: ClientConfig,
  options: OverlayBootstrapOptions = {},
): Promise<OverlayClient> {
  const output = options.output ?? new SilentOutput();
  const serverDestination = config.serverOverlayDestination;
  if (serverDestination === undefined) {
    throw new ConfigError('Server overlay destination is required for overlay connections', [
      { field: 'serverOverlayDestination', message: 'serverOverlayDestination must be set' },
    ]);
  }

  const transport = await openTransport(config.controlAddress, options, output);
  const address = bytesToHex(transport.registerDestination(serverDestination));
  if (address !== config.serverDestination.toLowerCase()) {
    await transport.close();
    throw new ConfigError('Server destination does not match the server overlay destination', [
      { field: 'serverDestination', message: `expected ${address}`, value: config.serverDestination },
    ]);
  }

  return { client: new ShellClient(config, transport, output), transport };
}

async function openTransport(
  controlAddress: string,
  options: OverlayBootstrapOptions,
  output: Output,
): Promise<OverlayTransport> {
  if (options.samClient) {
    return OverlayTransport.create({ client: options.samClient, sessionId: options.sessionId, output });
  }
  const resolved = await resolveControlAddress({ router: options.router, controlAddress, output });
  return OverlayTransport.create({ controlAddress: resolved, sessionId: options.sessionId, output });
}
