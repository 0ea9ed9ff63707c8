/**
 * @fileoverview Tool invocation routes.
 *
 * GET  /api/tools        - Tool schemas (name, description, input_schema)
 * POST /api/tools/:name  - Invoke a tool with a JSON object body
 *
 * Tool failures are part of the tool result and still answer 200; only an
 * unknown tool (404) or a body that is not a JSON object (400) is an HTTP
 * error.
 */

import { Router, type Request, type Response } from 'express';
import type { ToolRegistry } from '../tools/index.js';
import { createRequestId, withLogContext } from '../utils/observability/index.js';

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createToolsRouter(registry: ToolRegistry): Router {
  const router = Router();

  router.get('/api/tools', (_req: Request, res: Response) => {
    res.json({ tools: registry.tools });
  });

  router.post('/api/tools/:name', async (req: Request<{ name: string }>, res: Response) => {
    const { name } = req.params;
    if (!registry.has(name)) {
      res.status(404).json({ success: false, error: `Unknown tool: ${name}` });
      return;
    }

    const body: unknown = req.body ?? {};
    if (!isJsonObject(body)) {
      res.status(400).json({ success: false, error: 'Request body must be a JSON object' });
      return;
    }

    const requestId = createRequestId('tool');
    const result = await withLogContext({ requestId, tool: name }, () =>
      registry.execute(name, body, { requestId })
    );
    res.json(result);
  });

  return router;
}
