#!/usr/bin/env node

/**
 * Client and server in one process over the in-memory transport
 *
 * Run:
 *   npx tsx examples/loopback-session.ts
 */

import {
  ConsoleOutput,
  LoopbackTransport,
  ShellClient,
  ShellServer,
  buildClientConfig,
  buildServerConfig,
  bytesToString,
  randomBytes,
} from '../src/index.js';

async function main(): Promise<void> {
  const serverConfig = buildServerConfig({ commandTimeout: 10 });
  // Replies are only taken from the address the client dials
  const [clientTransport, serverTransport] = LoopbackTransport.createPair({
    addresses: [randomBytes(32), serverConfig.identity.address()],
  });

  const server = new ShellServer(serverConfig, serverTransport, new ConsoleOutput('[server] '));
  const running = server.run();

  const output = new ConsoleOutput('[client] ');
  const client = new ShellClient(
    buildClientConfig({ serverDestination: serverConfig.identity.addressHex() }),
    clientTransport,
    output,
  );

  try {
    await client.connect();

    const response = await client.executeCommand('uname', ['-a'], { env: { PATH: process.env.PATH ?? '/usr/bin:/bin' } });
    await output.info(`${response.status} (exit ${response.exitCode}, ${response.executionTimeMs}ms)`);
    process.stdout.write(bytesToString(response.stdout));

    await output.info(`Round trip: ${await client.ping()}ms`);
  } finally {
    await client.disconnect();
    await server.stop();
    await running;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
