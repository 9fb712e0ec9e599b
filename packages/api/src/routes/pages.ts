import { z } from 'zod';
import { initTRPC } from '@trpc/server';
import { pagePatchSchema, slugifyPageId } from '@pagewright/schema';
import type { PageLifecycleManager } from '@pagewright/core';
import { handle } from '../errors.js';

const t = initTRPC.create();

export function createPageRouter(lifecycle: PageLifecycleManager) {
  return t.router({
    list: t.procedure.query(async () => {
      return handle(() => lifecycle.listPages());
    }),

    get: t.procedure
      .input(z.object({ id: z.string() }))
      .query(async ({ input }) => {
        return handle(() => lifecycle.getPage(input.id));
      }),

    /** The id is derived from the title when omitted */
    create: t.procedure
      .input(
        z.object({
          id: z.string().optional(),
          title: z.string().min(1).max(200),
          starter: z.boolean().optional(),
        })
      )
      .mutation(async ({ input }) => {
        const pageId = input.id ?? slugifyPageId(input.title);
        return handle(() => lifecycle.addPage(pageId, input.title, { starter: input.starter }));
      }),

    copy: t.procedure
      .input(
        z.object({
          sourceId: z.string(),
          newId: z.string(),
          title: z.string().min(1).max(200),
        })
      )
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.copyPage(input.sourceId, input.newId, input.title));
      }),

    save: t.procedure
      .input(
        z.object({
          id: z.string(),
          patch: pagePatchSchema,
          publish: z.boolean().optional(),
        })
      )
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.savePage(input.id, input.patch, { publish: input.publish }));
      }),

    delete: t.procedure
      .input(z.object({ id: z.string() }))
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.deletePage(input.id));
      }),
  });
}
