/**
 * Command executor
 *
 * Runs one program per request with a cleared environment. On timeout the
 * child's whole process group is killed and the result is reported only
 * after the process is gone.
 */

import { spawn, ChildProcess } from 'child_process';
import { ExecutionError, errorMessage } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { CommandRequest, CommandResponse, CommandStatus } from '../protocol/messages.js';
import { stringToBytes } from '../crypto/utils.js';
import { MAX_COMMAND_TIMEOUT, validateCommandRequest } from '../validation.js';

export class CommandExecutor {
  private readonly running = new Set<ChildProcess>();

  constructor(
    /** Seconds, used when the request carries no timeout */
    private readonly defaultTimeout: number,
    private readonly output: Output = new SilentOutput(),
  ) {}

  /**
   * Throws ExecutionError for an empty command, a working directory with ".."
   * or a timeout outside 1..MAX_COMMAND_TIMEOUT seconds
   */
  validateRequest(request: CommandRequest): void {
    const validation = validateCommandRequest(request);
    if (!validation.valid) {
      throw new ExecutionError(validation.errors.map((issue) => issue.message).join('; '), {
        id: request.id.toString(),
        errors: validation.errors,
      });
    }
  }

  async execute(request: CommandRequest): Promise<CommandResponse> {
    const timeoutSeconds = request.timeout ?? this.defaultTimeout;
    const started = Date.now();

    await this.output.debug(`Executing ${request.command} ${request.args.join(' ')} (timeout ${timeoutSeconds}s)`);

    // setTimeout overflows past 2^31 - 1 ms
    const outcome = await this.run(request, Math.min(timeoutSeconds, MAX_COMMAND_TIMEOUT) * 1000);
    const executionTimeMs = Date.now() - started;

    switch (outcome.kind) {
      case 'spawn-error':
        await this.output.warning(`Failed to start ${request.command}: ${outcome.message}`);
        return response(request.id, 'Error', -1, new Uint8Array(0), stringToBytes(`Execution error: ${outcome.message}`), executionTimeMs);
      case 'timeout':
        await this.output.warning(`Command ${request.id} timed out after ${timeoutSeconds}s`);
        return response(request.id, 'Timeout', -1, new Uint8Array(0), new Uint8Array(0), executionTimeMs);
      case 'exit': {
        let status: CommandStatus;
        if (outcome.signal !== null) {
          status = 'Killed';
        } else {
          status = outcome.code === 0 ? 'Success' : 'Error';
        }
        return response(request.id, status, outcome.code ?? -1, outcome.stdout, outcome.stderr, executionTimeMs);
      }
    }
  }

  runningCount(): number {
    return this.running.size;
  }

  /**
   * Kill every running command's process group
   */
  killAll(): void {
    for (const child of this.running) {
      killGroup(child);
    }
  }

  private run(request: CommandRequest, timeoutMs: number): Promise<Outcome> {
    return new Promise<Outcome>((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(request.command, request.args, {
          cwd: request.workingDir,
          env: { ...request.env },
          stdio: ['ignore', 'pipe', 'pipe'],
          detached: true,
        });
      } catch (error) {
        resolve({ kind: 'spawn-error', message: errorMessage(error) });
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      this.running.add(child);
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      // Descendants may outlive the child and hold its pipes open, so the
      // timeout settles on the child's exit rather than on 'close'
      const timer = setTimeout(() => {
        timedOut = true;
        killGroup(child);
        child.stdout?.destroy();
        child.stderr?.destroy();
        if (child.exitCode !== null || child.signalCode !== null) {
          finish({ kind: 'timeout' });
        }
      }, timeoutMs);

      const finish = (outcome: Outcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.running.delete(child);
        resolve(outcome);
      };

      child.once('error', (error) => {
        finish({ kind: 'spawn-error', message: error.message });
      });

      child.once('exit', () => {
        if (timedOut) {
          finish({ kind: 'timeout' });
        }
      });

      child.once('close', (code, signal) => {
        if (timedOut) {
          finish({ kind: 'timeout' });
          return;
        }
        finish({
          kind: 'exit',
          code,
          signal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
        });
      });
    });
  }
}

type Outcome =
  | { kind: 'spawn-error'; message: string }
  | { kind: 'timeout' }
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null; stdout: Uint8Array; stderr: Uint8Array };

/**
 * SIGKILL the child's process group, which can outlive the child itself
 */
function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    // Group already gone (ESRCH); the direct child may still need reaping
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGKILL');
    }
  }
}

function response(
  id: bigint,
  status: CommandStatus,
  exitCode: number,
  stdout: Uint8Array,
  stderr: Uint8Array,
  executionTimeMs: number,
): CommandResponse {
  return { type: 'CommandResponse', id, status, stdout, stderr, exitCode, executionTimeMs };
}
