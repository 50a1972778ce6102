/**
 * ICMP reachability probe using the system ping command
 */

import { spawn } from 'child_process';
import { Logger, ProbeResult, ProbeTarget } from '../types';
import { Logger as ConsoleLogger } from '../utils/logger';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../error-handling';

export const DEFAULT_PROBE_TIMEOUT_MS = 2000;

/** Extra time granted to the ping process before it is killed */
const KILL_SLACK_MS = 500;

export interface Prober {
  probe(target: ProbeTarget): Promise<ProbeResult>;
}

export interface PingCommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs a ping command and collects its output. Rejects only when the process
 * cannot be started.
 */
export type PingCommandRunner = (
  command: string,
  args: string[],
  killAfterMs: number
) => Promise<PingCommandOutput>;

export interface PingProberOptions {
  timeoutMs?: number;
  platform?: NodeJS.Platform;
  runner?: PingCommandRunner;
  logger?: Logger;
  /** Receives spawn failures as PROBE_FAILURE and tracks the prober's health */
  errorHandler?: ErrorHandler;
}

/**
 * Default runner built on child_process.spawn
 */
export const spawnPingCommand: PingCommandRunner = (command, args, killAfterMs) => {
  return new Promise((resolve, reject) => {
    const pingProcess = spawn(command, args);
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let forceKillTimer: NodeJS.Timeout | undefined;

    pingProcess.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    pingProcess.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      pingProcess.kill('SIGTERM');

      // Force kill after 2 seconds if still running
      forceKillTimer = setTimeout(() => {
        if (pingProcess.exitCode === null && pingProcess.signalCode === null) {
          pingProcess.kill('SIGKILL');
        }
      }, 2000);
      forceKillTimer.unref();
    }, killAfterMs);

    pingProcess.on('error', (error: Error) => {
      clearTimeout(timeout);
      if (forceKillTimer) {
        clearTimeout(forceKillTimer);
      }
      reject(error);
    });

    pingProcess.on('close', (code: number | null) => {
      clearTimeout(timeout);
      if (forceKillTimer) {
        clearTimeout(forceKillTimer);
      }
      resolve({ exitCode: code, stdout, stderr, timedOut });
    });
  });
};

/**
 * Probes a target with a single echo request. Every failure (timeout, spawn
 * error, non-zero exit, lost packet) is reported as `reachable: false`; the
 * returned promise never rejects.
 */
export class PingProber implements Prober {
  private readonly timeoutMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly runner: PingCommandRunner;
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler | undefined;

  constructor(options: PingProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.platform = options.platform ?? process.platform;
    this.runner = options.runner ?? spawnPingCommand;
    this.logger = options.logger ?? new ConsoleLogger('PingProber');
    this.errorHandler = options.errorHandler;
  }

  async probe(target: ProbeTarget): Promise<ProbeResult> {
    const args = this.buildArgs(target.address);

    let output: PingCommandOutput;
    try {
      output = await this.runner('ping', args, this.timeoutMs + KILL_SLACK_MS);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.errorHandler) {
        this.errorHandler.handleError(error, {
          component: 'PingProber',
          category: ErrorCategory.PROBE_FAILURE,
          severity: ErrorSeverity.MEDIUM,
          target: target.address
        });
      } else {
        this.logger.error(`Failed to run ping for ${target.name} (${target.address}): ${message}`);
      }
      return { reachable: false, latency_ms: null, error_message: `Failed to spawn ping process: ${message}` };
    }
    this.errorHandler?.recordSuccess('PingProber');

    const result = this.parseOutput(output);
    this.logger.debug(
      `Probe ${target.name} (${target.address}): ${result.reachable ? `reachable, ${result.latency_ms ?? '?'}ms` : result.error_message}`
    );
    return result;
  }

  /**
   * Platform-specific arguments for a single echo request with a reply timeout
   */
  buildArgs(address: string): string[] {
    const timeoutSeconds = Math.max(1, Math.ceil(this.timeoutMs / 1000));

    switch (this.platform) {
      case 'win32':
        return ['-n', '1', '-w', String(this.timeoutMs), address];
      case 'darwin':
      case 'freebsd':
      case 'openbsd':
        return ['-c', '1', '-t', String(timeoutSeconds), address];
      default:
        return ['-c', '1', '-W', String(timeoutSeconds), address];
    }
  }

  private parseOutput(output: PingCommandOutput): ProbeResult {
    if (output.timedOut) {
      return { reachable: false, latency_ms: null, error_message: `Ping timed out after ${this.timeoutMs}ms` };
    }

    if (output.exitCode !== 0) {
      const detail = output.stderr.trim();
      return {
        reachable: false,
        latency_ms: null,
        error_message: detail !== '' ? detail : `Ping exited with code ${output.exitCode ?? 'null'}`
      };
    }

    const packetLoss = this.extractPacketLoss(output.stdout);
    if (packetLoss === 100) {
      return { reachable: false, latency_ms: null, error_message: 'All packets lost' };
    }

    return { reachable: true, latency_ms: this.extractLatency(output.stdout) };
  }

  private extractPacketLoss(output: string): number | null {
    // Unix: "0% packet loss" / "0.0% packet loss"; Windows: "(0% loss)"
    const lossMatch = output.match(/([\d.]+)% (?:packet )?loss/);
    return lossMatch && lossMatch[1] ? parseFloat(lossMatch[1]) : null;
  }

  /**
   * Average round-trip time in milliseconds. Supports:
   * - rtt min/avg/max/mdev = 3.319/3.393/3.500/0.070 ms (GNU/Linux)
   * - round-trip min/avg/max = 14.307/14.451/14.743 ms (Alpine/BusyBox)
   * - round-trip min/avg/max/stddev = 14.307/14.451/14.743/0.123 ms (macOS)
   * - Minimum = 3ms, Maximum = 3ms, Average = 3ms (Windows)
   * - time=12.3 ms / time<1ms (single reply line)
   */
  private extractLatency(output: string): number | null {
    const statsMatch = output.match(/min\/avg\/max(?:\/(?:mdev|stddev))? = [\d.]+\/([\d.]+)\//);
    if (statsMatch && statsMatch[1]) {
      return parseFloat(statsMatch[1]);
    }

    const windowsMatch = output.match(/Average = (\d+)ms/);
    if (windowsMatch && windowsMatch[1]) {
      return parseInt(windowsMatch[1], 10);
    }

    const replyMatch = output.match(/time([=<])([\d.]+) ?ms/);
    if (replyMatch && replyMatch[2]) {
      return parseFloat(replyMatch[2]);
    }

    return null;
  }
}
