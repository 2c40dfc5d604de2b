/**
 * Optional embedded overlay router
 *
 * The core only needs a control endpoint address. An embedded router, when
 * one is supplied, provides it after becoming ready; otherwise the configured
 * external endpoint is used.
 */

import { DEFAULT_CONTROL_ADDRESS } from '../config.js';
import { NetworkError } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { withTimeout } from '../timeout.js';

export interface RouterBootstrap {
  /** Resolves once the router accepts control connections */
  waitReady(): Promise<void>;
  /** host:port of the router's control endpoint, or null when it exposes none */
  controlAddress(): string | null;
  shutdown(): Promise<void>;
}

export interface ResolveControlOptions {
  router?: RouterBootstrap;
  controlAddress?: string;
  /** Default 120 s */
  readyTimeoutMs?: number;
  output?: Output;
}

export const DEFAULT_READY_TIMEOUT_MS = 120_000;

export async function resolveControlAddress(options: ResolveControlOptions = {}): Promise<string> {
  const output = options.output ?? new SilentOutput();
  const router = options.router;

  if (!router) {
    const address = options.controlAddress ?? DEFAULT_CONTROL_ADDRESS;
    await output.debug(`Using external control endpoint ${address}`);
    return address;
  }

  await output.info('Waiting for embedded router to become ready');
  await withTimeout(router.waitReady(), options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS, 'Router readiness');

  const address = router.controlAddress();
  if (address === null) {
    throw new NetworkError('Embedded router exposes no control endpoint');
  }

  await output.success(`Embedded router ready, control endpoint ${address}`);
  return address;
}
