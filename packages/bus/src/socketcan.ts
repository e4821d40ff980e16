// SocketCAN bus through can-utils
//
// Receives by reading `candump -L <iface>` line by line and sends by running
// `cansend <iface> <id>#<data>`. Requires can-utils on the host and an
// interface that is already up (`ip link set can0 up type can bitrate 250000`).

import { spawn, execFile } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { formatCansendArgument, parseCandumpLine } from '@rvlink/protocol';
import type { CanFrame, InterfaceName, OutboundFrame } from '@rvlink/protocol';
import type { CanBus } from './types.js';
import { ConnectivityError } from './errors.js';
import { FrameQueue } from './frame-queue.js';

/**
 * The parts of a child process the bus relies on
 */
export type DumpProcess = {
  stdout: Readable | null;
  kill(): boolean;
  on(event: 'exit', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
};

export type SocketCanBusOptions = {
  /** Starts the dump process (defaults to spawning candump) */
  startDump?: (iface: InterfaceName) => DumpProcess;

  /** Writes one frame (defaults to running cansend) */
  sendFrame?: (iface: InterfaceName, argument: string) => Promise<void>;

  /** Frames buffered for receive() before the oldest is discarded */
  queueCapacity?: number;
};

function spawnCandump(iface: InterfaceName): DumpProcess {
  return spawn('candump', ['-L', iface], { stdio: ['ignore', 'pipe', 'ignore'] });
}

function runCansend(iface: InterfaceName, argument: string): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile('cansend', [iface, argument], (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export class SocketCanBus implements CanBus {
  readonly name: InterfaceName;

  private queue: FrameQueue;
  private dump: DumpProcess;
  private sendFrame: (iface: InterfaceName, argument: string) => Promise<void>;
  private isClosed = false;

  constructor(name: InterfaceName, options: SocketCanBusOptions = {}) {
    const { startDump = spawnCandump, sendFrame = runCansend, queueCapacity } = options;
    this.name = name;
    this.queue = new FrameQueue({ capacity: queueCapacity });
    this.sendFrame = sendFrame;
    this.dump = startDump(name);

    this.dump.on('error', (error) => {
      this.fail(new ConnectivityError(name, 'candump failed', error));
    });
    this.dump.on('exit', (code) => {
      this.fail(new ConnectivityError(name, `candump exited with code ${code ?? 'null'}`));
    });

    if (this.dump.stdout) {
      const lines = createInterface({ input: this.dump.stdout });
      lines.on('line', (line) => {
        const frame = parseCandumpLine(line);
        if (frame && frame.interface === name) {
          this.queue.push(frame);
        }
      });
    } else {
      this.fail(new ConnectivityError(name, 'candump has no output stream'));
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Frames discarded because receive() fell behind candump */
  get droppedFrames(): number {
    return this.queue.dropped;
  }

  receive(signal?: AbortSignal): Promise<CanFrame> {
    return this.queue.next(signal);
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (this.isClosed) {
      throw new ConnectivityError(this.name, 'bus is closed');
    }
    try {
      await this.sendFrame(this.name, formatCansendArgument(frame));
    } catch (error) {
      throw new ConnectivityError(this.name, 'cansend failed', error instanceof Error ? error : undefined);
    }
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.fail(new ConnectivityError(this.name, 'bus is closed'));
    this.dump.kill();
  }

  private fail(error: ConnectivityError): void {
    this.isClosed = true;
    this.queue.fail(error);
  }
}
