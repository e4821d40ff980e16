// Entities router - list, read and control mapped entities

import { z } from 'zod';
import type { EntityDescriptor, EntityState } from '@rvlink/protocol';
import { isDeviceClass } from '@rvlink/protocol';
import { EntityNotFoundError } from '@rvlink/runtime';
import type { Gateway } from '@rvlink/runtime';
import { router, publicProcedure } from '../index.js';

/**
 * A descriptor with its current state (null until the entity is first seen).
 */
export type EntityView = EntityDescriptor & { state: EntityState | null };

const ControlRequestSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('set'), state: z.enum(['on', 'off']), brightness: z.number().optional() }),
  z.object({ command: z.literal('toggle') }),
  z.object({ command: z.literal('brightness_up') }),
  z.object({ command: z.literal('brightness_down') }),
  z.object({ command: z.literal('lock') }),
  z.object({ command: z.literal('unlock') }),
]);

function view(gateway: Gateway, descriptor: EntityDescriptor): EntityView {
  return { ...descriptor, state: gateway.store.get(descriptor.entityId) ?? null };
}

function requireEntity(gateway: Gateway, id: string): EntityDescriptor {
  const descriptor = gateway.devices.get(id);
  if (!descriptor) {
    throw new EntityNotFoundError(id);
  }
  return descriptor;
}

export const entitiesRouter = router({
  /**
   * List entities, optionally by device class and area.
   */
  list: publicProcedure
    .input(
      z
        .object({
          deviceClass: z.string().refine(isDeviceClass, 'Unknown device class').optional(),
          area: z.string().optional(),
        })
        .default({})
    )
    .query(({ ctx, input }) => {
      return ctx.gateway.devices
        .list({ deviceClass: input.deviceClass, area: input.area })
        .map((descriptor) => view(ctx.gateway, descriptor));
    }),

  ids: publicProcedure.query(({ ctx }) => {
    return ctx.gateway.devices.list().map((descriptor) => descriptor.entityId);
  }),

  get: publicProcedure.input(z.object({ id: z.string() })).query(({ ctx, input }) => {
    return view(ctx.gateway, requireEntity(ctx.gateway, input.id));
  }),

  /**
   * Recorded state changes, oldest first. Empty when history is disabled.
   * Waits for writes already handed off so a client reads its own changes.
   */
  history: publicProcedure
    .input(
      z.object({
        id: z.string(),
        since: z.string().datetime().optional(),
        limit: z.number().int().min(1).max(1000).optional(),
      })
    )
    .query(async ({ ctx, input }) => {
      requireEntity(ctx.gateway, input.id);
      if (!ctx.gateway.history) {
        return [];
      }
      await ctx.gateway.store.flushHistory();
      return ctx.gateway.history.list(input.id, { since: input.since, limit: input.limit });
    }),

  /**
   * Send a control request. Resolves once the frames are on the bus.
   */
  control: publicProcedure
    .input(z.object({ id: z.string(), request: ControlRequestSchema }))
    .mutation(async ({ ctx, input }) => {
      const receipt = await ctx.gateway.controller.control(input.id, input.request);
      ctx.logger.info('Control request handled', { entityId: input.id, command: input.request.command });
      return receipt;
    }),
});
