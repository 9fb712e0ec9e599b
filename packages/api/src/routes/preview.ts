/**
 * Preview Routes
 *
 * GET  /preview/:pageId       - Render a saved page
 * POST /preview/:pageId       - Render unsaved page data (falls back to the saved page on an empty body)
 * POST /preview-component     - Render one component in a standalone document
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  PagewrightError,
  errorMessage,
  type Logger,
  type PageLifecycleManager,
  type PageRenderer,
} from '@pagewright/core';
import { httpStatusFor } from '../errors.js';

const componentPreviewSchema = z.object({
  type: z.string().min(1),
  data: z.record(z.unknown()).default({}),
});

function hasBody(body: unknown): boolean {
  return typeof body === 'object' && body !== null && Object.keys(body).length > 0;
}

export function createPreviewRouter(
  lifecycle: PageLifecycleManager,
  renderer: PageRenderer,
  logger: Logger
): Router {
  const router = Router();

  const sendHtml = (res: Response, html: string) => {
    res.type('html').send(html);
  };

  const sendError = (res: Response, error: unknown) => {
    const status = httpStatusFor(error);
    if (status === 500) {
      logger.error('Preview failed', errorMessage(error));
      res.status(500).json({ error: 'Failed to render preview', code: 'INTERNAL_ERROR' });
      return;
    }
    res.status(status).json({
      error: errorMessage(error),
      code: error instanceof PagewrightError ? error.code : 'INTERNAL_ERROR',
    });
  };

  // GET /preview/:pageId
  router.get('/preview/:pageId', async (req: Request, res: Response) => {
    try {
      sendHtml(res, await lifecycle.previewPage(req.params.pageId));
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /preview/:pageId
  router.post('/preview/:pageId', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const html = hasBody(body)
        ? await renderer.renderPagePreview(body)
        : await lifecycle.previewPage(req.params.pageId);
      sendHtml(res, html);
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /preview-component
  router.post('/preview-component', async (req: Request, res: Response) => {
    const parsed = componentPreviewSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Component type is required',
        code: 'INVALID_COMPONENT',
      });
      return;
    }

    try {
      sendHtml(res, await renderer.renderComponentPreview(parsed.data.type, parsed.data.data));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
