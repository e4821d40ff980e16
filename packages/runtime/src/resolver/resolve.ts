// Entity resolver
//
// Maps a decoded frame to the descriptor it reports on. Lookup order:
//   1. (dgn, instance) as a primary key
//   2. (dgn, instance) as a companion status key
//   3. (dgn, default) as a primary key
//   4. (dgn, default) as a companion status key
// An exact instance match always beats a default, whichever index holds it.

import type { DecodedFrame, EntityDescriptor } from '@rvlink/protocol';
import type { DeviceTable } from '../tables/device-table.js';

/**
 * Find the descriptor a decoded frame belongs to.
 *
 * @returns The descriptor, or null for a resolution miss
 */
export function resolveEntity(
  frame: Pick<DecodedFrame, 'dgn' | 'instance'>,
  devices: DeviceTable
): EntityDescriptor | null {
  const { dgn, instance } = frame;

  if (instance !== null) {
    const exact = devices.findPrimary(dgn, instance) ?? devices.findStatus(dgn, instance);
    if (exact) {
      return exact;
    }
  }

  return devices.findPrimary(dgn, 'default') ?? devices.findStatus(dgn, 'default') ?? null;
}
