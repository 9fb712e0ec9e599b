import { z } from 'zod';
import { initTRPC, TRPCError } from '@trpc/server';
import {
  DEFAULT_GENERATED_PAGE_ID,
  parseAssistantReply,
  validateGeneratedComponents,
  type DefinitionCatalog,
  type PageLifecycleManager,
} from '@pagewright/core';
import { handle } from '../errors.js';

const t = initTRPC.create();

export const NO_PAYLOAD_MESSAGE = 'No page data found in reply';

export function createAssistantRouter(lifecycle: PageLifecycleManager, catalog: DefinitionCatalog) {
  return t.router({
    /** Extract and check the payload of an assistant reply without storing it */
    validate: t.procedure
      .input(z.object({ reply: z.string() }))
      .mutation(({ input }) => {
        const payload = parseAssistantReply(input.reply);
        if (!payload) {
          return { payload: null, valid: false, errors: [NO_PAYLOAD_MESSAGE] };
        }
        return { payload, ...validateGeneratedComponents(catalog, payload.components) };
      }),

    apply: t.procedure
      .input(
        z.object({
          reply: z.string(),
          pageId: z.string().default(DEFAULT_GENERATED_PAGE_ID),
        })
      )
      .mutation(async ({ input }) => {
        const payload = parseAssistantReply(input.reply);
        if (!payload) {
          throw new TRPCError({ code: 'BAD_REQUEST', message: NO_PAYLOAD_MESSAGE });
        }
        return handle(() => lifecycle.applyGeneratedPage(input.pageId, payload));
      }),
  });
}
