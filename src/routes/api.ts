import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { LoadResult, helpFileName, sourceFormat } from '../loader.js';
import { ConvertOptions, convertHtml, convertMarkdown } from '../convert.js';
import { ConversionError } from '../errors.js';
import { ConversionDefaults } from '../config.js';

const convertOptionsSchema = z.object({
  title: z.string().optional(),
  embeddedFilename: z.string().optional(),
  baseURL: z.string().url().optional(),
  contentSelector: z.string().min(1).optional(),
  selectorsToIgnore: z.array(z.string().min(1)).optional(),
  ignoredLinkTargets: z.array(z.string()).optional(),
  externalDocPrefix: z.string().optional(),
  modeline: z.string().optional(),
  textWidth: z.number().int().min(20).max(400).optional(),
});

const convertRequestSchema = z.object({
  html: z.string().optional(),
  markdown: z.string().optional(),
  options: convertOptionsSchema.default({}),
});

/**
 * Send a conversion failure as JSON; anything else is an internal error
 */
function sendError(res: Response, error: unknown): void {
  if (error instanceof ConversionError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  console.error('Conversion failed', error);
  res.status(500).json({ error: 'Internal server error.' });
}

/**
 * Create API routes for document access and conversion
 */
export function createApiRoutes(data: LoadResult, defaults: ConversionDefaults = { selectorsToIgnore: [], ignoredLinkTargets: [] }): Router {
  const router = Router();

  /**
   * GET /api/documents
   * List all loaded documents
   */
  router.get('/documents', (_req: Request, res: Response) => {
    const documents = Array.from(data.corpus.keys());
    res.json(documents);
  });

  /**
   * GET /api/document/:id
   * Get raw content of a document
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const content = data.corpus.get(id);

    if (content === undefined) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.type(sourceFormat(id) === 'markdown' ? 'text/markdown' : 'text/html').send(content);
  });

  /**
   * GET /api/render/:id
   * Render a document as a Vim help file
   */
  router.get('/render/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const content = data.corpus.get(id);

    if (content === undefined) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    const options: ConvertOptions = { ...defaults, embeddedFilename: helpFileName(id) };
    try {
      const text = sourceFormat(id) === 'markdown'
        ? convertMarkdown(content, options)
        : convertHtml(content, options);
      res.type('text/plain').send(text);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/convert
   * Convert posted HTML or Markdown
   * Body: { html?: string, markdown?: string, options?: {...} }
   */
  router.post('/convert', (req: Request, res: Response) => {
    const parsed = convertRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ error: `Invalid payload: ${issue.path.join('.') || 'body'}: ${issue.message}` });
      return;
    }

    const { html, markdown, options } = parsed.data;
    if (html === undefined && markdown === undefined) {
      res.status(400).json({ error: 'Payload must include html or markdown.' });
      return;
    }

    const merged: ConvertOptions = { ...defaults, ...options };
    try {
      const text = html !== undefined
        ? convertHtml(html, merged)
        : convertMarkdown(markdown ?? '', merged);
      res.type('text/plain').send(text);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
