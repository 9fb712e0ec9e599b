import { z } from 'zod';
import { initTRPC, TRPCError } from '@trpc/server';
import type { DefinitionCatalog } from '@pagewright/core';

const t = initTRPC.create();

export function createCatalogRouter(catalog: DefinitionCatalog) {
  return t.router({
    components: t.procedure
      .input(z.object({ category: z.string().optional() }).optional())
      .query(({ input }) => {
        return catalog.getComponents(input?.category);
      }),

    component: t.procedure
      .input(z.object({ id: z.string() }))
      .query(({ input }) => {
        const component = catalog.getComponent(input.id);
        if (!component) {
          throw new TRPCError({ code: 'NOT_FOUND', message: `Component not found: ${input.id}` });
        }
        return component;
      }),

    templates: t.procedure.query(() => {
      return catalog.getTemplates();
    }),

    colorSchemes: t.procedure.query(() => {
      return catalog.getColorSchemes();
    }),
  });
}
