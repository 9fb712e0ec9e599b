import { z } from 'zod';
import { initTRPC } from '@trpc/server';
import { siteSettingsPatchSchema } from '@pagewright/schema';
import type { PageLifecycleManager } from '@pagewright/core';
import { handle } from '../errors.js';

const t = initTRPC.create();

export function createSiteRouter(lifecycle: PageLifecycleManager) {
  return t.router({
    get: t.procedure.query(async () => {
      return handle(() => lifecycle.getSite());
    }),

    /** Page list for the editor; drops pages whose config has gone missing */
    dashboard: t.procedure.query(async () => {
      return handle(() => lifecycle.loadDashboard());
    }),

    init: t.procedure
      .input(
        z.object({
          templateId: z.string().min(1),
          colorSchemeId: z.string().min(1),
          siteName: z.string().min(1).max(100),
        })
      )
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.initSite(input.templateId, input.colorSchemeId, input.siteName));
      }),

    updateSettings: t.procedure
      .input(siteSettingsPatchSchema)
      .mutation(async ({ input }) => {
        return handle(() => lifecycle.updateSiteSettings(input));
      }),

    reconcile: t.procedure.mutation(async () => {
      return handle(() => lifecycle.reconcileSite());
    }),
  });
}
