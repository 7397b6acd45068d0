import { Router, Request, Response } from 'express';
import { DialogueError, NotFound } from '../errors.js';
import { LoadResult, LoadedScript } from '../loader.js';
import { formatScript } from '../parser.js';
import { SessionStore } from '../session.js';
import { checkSource, isRuleSeverity, ValidationOptions } from '../validator.js';

/**
 * Send a DialogueError as `{ error }` with its status code; anything else is a 500.
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof DialogueError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  console.error('[api] Request failed', error);
  res.status(500).json({ error: 'Internal server error.' });
}

function findScript(data: LoadResult, scriptId: string): LoadedScript {
  const script = data.scripts.get(scriptId);
  if (!script) {
    throw new NotFound(`Script not found: ${scriptId}`);
  }
  return script;
}

function parseOptions(raw: unknown): ValidationOptions | undefined {
  if (raw === undefined) {
    return {};
  }
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  const options: ValidationOptions = {};
  if ('unknownCommands' in raw) {
    if (!isRuleSeverity(raw.unknownCommands)) return undefined;
    options.unknownCommands = raw.unknownCommands;
  }
  if ('topLevelBlock' in raw) {
    if (!isRuleSeverity(raw.topLevelBlock)) return undefined;
    options.topLevelBlock = raw.topLevelBlock;
  }
  return options;
}

/**
 * Create API routes for scripts and playthrough sessions
 */
export function createApiRoutes(data: LoadResult, sessions: SessionStore): Router {
  const router = Router();

  /**
   * GET /api/scripts
   * List loaded scripts with their markers and validation warnings
   */
  router.get('/scripts', (_req: Request, res: Response) => {
    const result = Array.from(data.scripts.values()).map(script => ({
      scriptId: script.scriptId,
      markers: Array.from(script.built.markers.keys()),
      warnings: script.warnings
    }));
    res.json(result);
  });

  /**
   * GET /api/scripts/:id
   * Raw text of a loaded script
   */
  router.get('/scripts/:id', (req: Request, res: Response) => {
    try {
      const script = findScript(data, req.params.id);
      res.type('text/plain').send(data.corpus.get(script.scriptId) ?? '');
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/scripts/:id/formatted
   * Canonical text of a loaded script
   */
  router.get('/scripts/:id/formatted', (req: Request, res: Response) => {
    try {
      const script = findScript(data, req.params.id);
      res.type('text/plain').send(formatScript(script.document));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/check
   * Parse and validate script text without loading it
   * Body: { source: string, options?: { unknownCommands?, topLevelBlock? } }
   */
  router.post('/check', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('source' in body) || typeof body.source !== 'string') {
      res.status(400).json({ error: 'Body field "source" must be a string' });
      return;
    }
    const options = parseOptions('options' in body ? body.options : undefined);
    if (!options) {
      res.status(400).json({ error: 'Body field "options" holds an invalid rule policy' });
      return;
    }
    try {
      res.json(checkSource(body.source, options));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/sessions
   * Start a playthrough
   * Body: { scriptId: string }
   */
  router.post('/sessions', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('scriptId' in body) || typeof body.scriptId !== 'string') {
      res.status(400).json({ error: 'Body field "scriptId" must be a string' });
      return;
    }
    try {
      const session = sessions.create(findScript(data, body.scriptId));
      res.status(201).json({ sessionId: session.sessionId, scriptId: session.scriptId });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/sessions/:id', (req: Request, res: Response) => {
    try {
      res.json(sessions.get(req.params.id).view());
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/sessions/:id/tick
   * Advance by one line; a GOTO is followed straight away
   */
  router.post('/sessions/:id/tick', (req: Request, res: Response) => {
    try {
      res.json(sessions.get(req.params.id).step());
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/sessions/:id/choose
   * Body: { index: number }
   */
  router.post('/sessions/:id/choose', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('index' in body) || typeof body.index !== 'number') {
      res.status(400).json({ error: 'Body field "index" must be a number' });
      return;
    }
    try {
      res.json(sessions.get(req.params.id).choose(body.index));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/sessions/:id/goto
   * Body: { marker: string }
   */
  router.post('/sessions/:id/goto', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('marker' in body) || typeof body.marker !== 'string') {
      res.status(400).json({ error: 'Body field "marker" must be a string' });
      return;
    }
    try {
      res.json(sessions.get(req.params.id).goto(body.marker));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete('/sessions/:id', (req: Request, res: Response) => {
    try {
      sessions.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
