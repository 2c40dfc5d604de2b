#!/usr/bin/env node

/**
 * Remote shell over an overlay router's SAM bridge
 *
 * Start the server; it prints its overlay destination and address:
 *   npx tsx examples/overlay-shell.ts server
 *
 * Then, from any machine with a router:
 *   SERVER_DESTINATION=<destination> npx tsx examples/overlay-shell.ts client ls -la
 *
 * CONTROL_ADDRESS overrides the bridge endpoint (default 127.0.0.1:7656).
 */

import {
  ConsoleOutput,
  addressOfDestination,
  buildClientConfig,
  buildServerConfig,
  bytesToHex,
  bytesToString,
  createOverlayClient,
  createOverlayServer,
} from '../src/index.js';

const controlAddress = process.env.CONTROL_ADDRESS;

async function serve(): Promise<void> {
  const output = new ConsoleOutput('[server] ');
  const { server } = await createOverlayServer(buildServerConfig({ controlAddress }), { output });

  process.once('SIGINT', () => {
    server.stop().catch((error: unknown) => console.error(error));
  });
  await server.run();
}

async function run(command: string, args: string[]): Promise<void> {
  const destination = process.env.SERVER_DESTINATION;
  if (!destination) {
    throw new Error('SERVER_DESTINATION is required');
  }

  const output = new ConsoleOutput('[client] ');
  const { client, transport } = await createOverlayClient(
    buildClientConfig({
      serverDestination: bytesToHex(addressOfDestination(destination)),
      serverOverlayDestination: destination,
      controlAddress,
    }),
    { output },
  );

  try {
    await client.connect();
    const response = await client.executeCommand(command, args, { env: { PATH: '/usr/local/bin:/usr/bin:/bin' } });
    process.stdout.write(bytesToString(response.stdout));
    process.stderr.write(bytesToString(response.stderr));
    process.exitCode = response.exitCode === 0 ? 0 : 1;
  } finally {
    await client.disconnect();
    await transport.close();
  }
}

async function main(): Promise<void> {
  const [mode, command, ...args] = process.argv.slice(2);
  if (mode === 'server') {
    await serve();
  } else if (mode === 'client' && command) {
    await run(command, args);
  } else {
    console.error('Usage: overlay-shell.ts server | client <command> [args...]');
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
