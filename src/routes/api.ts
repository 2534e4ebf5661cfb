import { Router, Request, Response } from 'express';
import { LoadResult } from '../loader.js';
import { collectAncestorComponents } from '../inheritance.js';
import { findAndSanitize } from '../sanitizer.js';
import { renderPrototypes } from '../renderer.js';
import { PlainValue, toPlain } from '../nodes.js';
import { InheritanceCycleError, PrototypeNotFoundError } from '../errors.js';

/**
 * Create API routes for inspecting and sanitizing prototypes
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  /**
   * GET /api/prototypes
   * List all prototype ids with their source files
   * Query params: ?limit=10
   */
  router.get('/prototypes', (req: Request, res: Response) => {
    const { limit } = req.query;

    let ids = Array.from(data.prototypes.keys()).sort();

    if (limit && typeof limit === 'string') {
      const n = parseInt(limit, 10);
      if (!isNaN(n) && n > 0) {
        ids = ids.slice(0, n);
      }
    }

    res.json(ids.map(id => ({ id, sourceFile: data.sources.get(id) })));
  });

  /**
   * GET /api/prototype/:id
   * The stored prototype as plain JSON
   */
  router.get('/prototype/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const prototype = data.prototypes.get(id);

    if (!prototype) {
      res.status(404).json({ error: `Prototype not found: ${id}` });
      return;
    }

    res.json(toPlain(prototype));
  });

  /**
   * GET /api/prototype/:id/ancestors
   * Inherited components grouped by type, nearest ancestor first
   */
  router.get('/prototype/:id/ancestors', (req: Request, res: Response) => {
    const { id } = req.params;
    const prototype = data.prototypes.get(id);

    if (!prototype) {
      res.status(404).json({ error: `Prototype not found: ${id}` });
      return;
    }

    try {
      const inherited = collectAncestorComponents(prototype, data.prototypes);
      res.json(Object.fromEntries(
        Array.from(inherited, ([type, components]): [string, PlainValue[]] => [type, components.map(toPlain)])
      ));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /api/sanitize/:id
   * Sanitized prototype as YAML, or as JSON with a report when ?format=json
   */
  router.get('/sanitize/:id', (req: Request, res: Response) => {
    const { id } = req.params;

    try {
      const { document, report } = findAndSanitize(id, data.prototypes);

      if (req.query.format === 'json') {
        res.json({ document: toPlain(document), report });
        return;
      }

      res.type('text/yaml').send(renderPrototypes([document]));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof PrototypeNotFoundError || err instanceof InheritanceCycleError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }
  throw err;
}
