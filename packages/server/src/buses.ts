// Bus factory - opens the configured kind of bus for an interface

import { ReplayCanBus, SocketCanBus, VirtualCanBus } from '@rvlink/bus';
import type { CanBusFactory } from '@rvlink/bus';
import { ConfigurationError } from '@rvlink/runtime';
import type { ServerConfig } from './config.js';

export type BusConfig = Pick<ServerConfig, 'bus' | 'replayFile' | 'replaySpeed'>;

/**
 * Build the factory the supervisor calls to (re)open an interface.
 *
 * - socketcan: candump/cansend on a live interface
 * - replay: loops a capture file, recorded on the same interface name
 * - virtual: an empty loopback bus; commands are echoed back as traffic
 */
export function createBusFactory(config: BusConfig): CanBusFactory {
  switch (config.bus) {
    case 'socketcan':
      return async (name) => new SocketCanBus(name);

    case 'replay': {
      const { replayFile } = config;
      if (!replayFile) {
        throw new ConfigurationError('Replay bus needs a capture file');
      }
      return (name) => ReplayCanBus.open(name, replayFile, { speed: config.replaySpeed, loop: true });
    }

    case 'virtual':
      return async (name) => new VirtualCanBus(name, { loopback: true });
  }
}
