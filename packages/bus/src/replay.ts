// Capture replay bus
//
// Plays back a recorded capture (NDJSON or candump log) as if it were live
// traffic. Sent frames are recorded, never transmitted.

import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { parseCandumpLine, parseCapture } from '@rvlink/protocol';
import type { CanFrame, InterfaceName, OutboundFrame } from '@rvlink/protocol';
import type { CanBus } from './types.js';
import { ConnectivityError, ReceiveCancelledError, isAbortError } from './errors.js';

export type ReplayCanBusOptions = {
  /** Interface the frames were recorded on (defaults to the bus name) */
  sourceInterface?: InterfaceName;

  /**
   * Playback speed relative to the recording. 1 keeps the original gaps,
   * 0 replays as fast as frames are pulled.
   */
  speed?: number;

  /** Start again from the first frame when the capture ends */
  loop?: boolean;
};

/**
 * Parse capture file content. Lines starting with "{" are NDJSON records;
 * anything else is read as candump -L output.
 */
export function parseCaptureFile(content: string): CanFrame[] {
  const firstLine = content.trimStart();
  if (firstLine.startsWith('{')) {
    return parseCapture(content);
  }

  const frames: CanFrame[] = [];
  for (const line of content.split('\n')) {
    const frame = parseCandumpLine(line);
    if (frame) {
      frames.push(frame);
    }
  }
  return frames;
}

export class ReplayCanBus implements CanBus {
  readonly name: InterfaceName;
  readonly sent: OutboundFrame[] = [];

  private frames: CanFrame[];
  private position = 0;
  private speed: number;
  private loop: boolean;
  private isClosed = false;

  constructor(name: InterfaceName, frames: CanFrame[], options: ReplayCanBusOptions = {}) {
    const { sourceInterface = name, speed = 0, loop = false } = options;
    this.name = name;
    this.speed = speed;
    this.loop = loop;
    this.frames = frames
      .filter((frame) => frame.interface === sourceInterface)
      .map((frame) => ({ ...frame, interface: name }));
  }

  /**
   * Open a replay bus over a capture file.
   */
  static async open(name: InterfaceName, path: string, options: ReplayCanBusOptions = {}): Promise<ReplayCanBus> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConnectivityError(
        name,
        `cannot read capture ${path}`,
        error instanceof Error ? error : undefined
      );
    }
    return new ReplayCanBus(name, parseCaptureFile(content), options);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of frames in the capture for this interface */
  get length(): number {
    return this.frames.length;
  }

  async receive(signal?: AbortSignal): Promise<CanFrame> {
    if (signal?.aborted) {
      throw new ReceiveCancelledError();
    }
    if (this.isClosed) {
      throw new ConnectivityError(this.name, 'bus is closed');
    }

    if (this.position >= this.frames.length) {
      if (!this.loop || this.frames.length === 0) {
        this.isClosed = true;
        throw new ConnectivityError(this.name, 'end of capture');
      }
      this.position = 0;
    }

    const frame = this.frames[this.position];
    const previous = this.position > 0 ? this.frames[this.position - 1] : null;
    this.position++;

    if (this.speed > 0 && previous) {
      const gap = Date.parse(frame.timestamp) - Date.parse(previous.timestamp);
      if (gap > 0) {
        try {
          await sleep(gap / this.speed, undefined, { signal });
        } catch (error) {
          this.position--;
          if (isAbortError(error)) {
            throw new ReceiveCancelledError();
          }
          throw error;
        }
      }
    }

    return frame;
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (this.isClosed) {
      throw new ConnectivityError(this.name, 'bus is closed');
    }
    this.sent.push(frame);
  }

  async close(): Promise<void> {
    this.isClosed = true;
  }
}
