import { z } from 'zod';
import { initTRPC } from '@trpc/server';
import type { AssetLibrary } from '@pagewright/core';
import { handle } from '../errors.js';

const t = initTRPC.create();

export function createAssetRouter(assets: AssetLibrary) {
  return t.router({
    list: t.procedure.query(async () => {
      return handle(() => assets.listAssets());
    }),

    /** File contents arrive base64-encoded */
    upload: t.procedure
      .input(
        z.object({
          filename: z.string().min(1).max(255),
          data: z.string().base64(),
        })
      )
      .mutation(async ({ input }) => {
        return handle(() => assets.uploadAsset(input.filename, Buffer.from(input.data, 'base64')));
      }),
  });
}
