import { z } from 'zod';
import { initTRPC } from '@trpc/server';
import type { PageLifecycleManager } from '@pagewright/core';
import { handle } from '../errors.js';

const t = initTRPC.create();

export function createPublishRouter(lifecycle: PageLifecycleManager) {
  return t.router({
    page: t.procedure
      .input(z.object({ id: z.string() }))
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.publishPage(input.id));
      }),

    all: t.procedure.mutation(async () => {
      return handle(() => lifecycle.publishAll());
    }),
  });
}
