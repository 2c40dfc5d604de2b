/**
 * Append-only JSON-lines audit log
 *
 * Write failures are reported through Output and never fail the operation
 * being audited.
 */

import { appendFile } from 'fs/promises';
import { bytesToHex } from '../crypto/utils.js';
import { errorMessage } from '../error.js';
import { Output, SilentOutput } from '../output.js';
import { CommandRequest, CommandResponse } from '../protocol/messages.js';

export type AuditEvent =
  | { event: 'session_opened'; sessionId: string; clientIdentity: string }
  | { event: 'session_closed'; sessionId: string; reason: string }
  | {
      event: 'command_executed';
      sessionId: string;
      requestId: string;
      command: string;
      args: string[];
      status: string;
      exitCode: number;
      durationMs: number;
    };

export class AuditLog {
  constructor(
    private readonly path: string,
    private readonly output: Output = new SilentOutput(),
  ) {}

  async sessionOpened(sessionId: string, clientIdentity: Uint8Array): Promise<void> {
    await this.write({ event: 'session_opened', sessionId, clientIdentity: bytesToHex(clientIdentity) });
  }

  async sessionClosed(sessionId: string, reason: string): Promise<void> {
    await this.write({ event: 'session_closed', sessionId, reason });
  }

  async commandExecuted(sessionId: string, request: CommandRequest, response: CommandResponse): Promise<void> {
    await this.write({
      event: 'command_executed',
      sessionId,
      requestId: request.id.toString(),
      command: request.command,
      args: request.args,
      status: response.status,
      exitCode: response.exitCode,
      durationMs: response.executionTimeMs,
    });
  }

  private async write(event: AuditEvent): Promise<void> {
    const line = JSON.stringify({ timestamp: new Date().toISOString(), ...event });
    try {
      await appendFile(this.path, `${line}\n`, 'utf-8');
    } catch (error) {
      await this.output.warning(`Failed to write audit log ${this.path}: ${errorMessage(error)}`);
    }
  }
}
