// Meta router - what the mapping describes

import type { Capability, DeviceClass } from '@rvlink/protocol';
import { router, publicProcedure } from '../index.js';

export type BridgeMeta = {
  areas: string[];
  deviceClasses: DeviceClass[];
  capabilities: Capability[];
  groups: string[];
  coachInfo: Record<string, string>;
};

function sortedUnique<T extends string>(values: Iterable<T>): T[] {
  return Array.from(new Set(values)).sort();
}

export const metaRouter = router({
  get: publicProcedure.query(({ ctx }): BridgeMeta => {
    const descriptors = ctx.gateway.devices.list();
    return {
      areas: sortedUnique(descriptors.map((descriptor) => descriptor.area)),
      deviceClasses: sortedUnique(descriptors.map((descriptor) => descriptor.deviceClass)),
      capabilities: sortedUnique(descriptors.flatMap((descriptor) => descriptor.capabilities)),
      groups: sortedUnique(descriptors.flatMap((descriptor) => descriptor.groups)),
      coachInfo: { ...ctx.gateway.devices.coachInfo },
    };
  }),
});
