/**
 * Project API routes -- REST surface over one loaded project.
 *
 * Endpoints:
 *   GET    /                    — Project snapshot (items, graphs, orders)
 *   POST   /items               — Add item
 *   DELETE /items/:name         — Remove item
 *   POST   /items/:name/rename  — Rename item
 *   POST   /connections         — Connect two items
 *   DELETE /connections         — Remove a connection
 *   POST   /execute             — Run all graphs, or only those touched by `selected`
 *   POST   /stop                — Stop the current run
 *   POST   /export              — Export acyclic graphs to GraphML
 *   POST   /save                — Write project.json
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Project } from '../services/project.js';
import { ProjectFileError, errorMessage } from '../utils/errors.js';
import { ConnectionSchema, ItemConfigSchema, ItemNameSchema, formatIssues } from '../utils/projectValidator.js';

const RenameBodySchema = z.object({ newName: ItemNameSchema }).strict();

const ExecuteBodySchema = z.object({
  selected: z.array(ItemNameSchema).max(1000).optional(),
  /** Respond after the run ends instead of right away. */
  wait: z.boolean().optional(),
}).strict();

const ExportBodySchema = z.object({ dir: z.string().min(1).max(1000).optional() }).strict();

export interface ProjectRouterDeps {
  project: Project;
}

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({ detail: 'Invalid request', errors: formatIssues(error) });
}

function serverError(res: Response, err: unknown): void {
  const status = err instanceof ProjectFileError ? 400 : 500;
  res.status(status).json({ detail: errorMessage(err) });
}

export function createProjectRouter(deps: ProjectRouterDeps): Router {
  const { project } = deps;
  const router = Router();

  /** Structural edits are refused while a run is in progress. */
  function rejectWhileRunning(res: Response): boolean {
    if (!project.isRunning) return false;
    res.status(409).json({ detail: 'Execution already in progress' });
    return true;
  }

  // GET / — Project snapshot
  router.get('/', (_req: Request, res: Response) => {
    res.json(project.snapshot());
  });

  // POST /items — Add item
  router.post('/items', (req: Request, res: Response) => {
    const parsed = ItemConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    if (project.getItem(parsed.data.name)) {
      res.status(409).json({ detail: `Item already exists: ${parsed.data.name}` });
      return;
    }
    try {
      const item = project.createItem(parsed.data);
      if (!item) {
        res.status(400).json({ detail: `Could not create item: ${parsed.data.name}` });
        return;
      }
      res.status(201).json({ item: item.toJSON() });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // DELETE /items/:name — Remove item
  router.delete('/items/:name', (req: Request, res: Response) => {
    const name = req.params.name;
    if (rejectWhileRunning(res)) return;
    try {
      if (!project.removeItem(name)) {
        res.status(404).json({ detail: `Item not found: ${name}` });
        return;
      }
      res.json({ status: 'deleted' });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // POST /items/:name/rename — Rename item
  router.post('/items/:name/rename', (req: Request, res: Response) => {
    const name = req.params.name;
    const parsed = RenameBodySchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    if (!project.getItem(name)) {
      res.status(404).json({ detail: `Item not found: ${name}` });
      return;
    }
    if (rejectWhileRunning(res)) return;
    if (project.getItem(parsed.data.newName)) {
      res.status(409).json({ detail: `Item already exists: ${parsed.data.newName}` });
      return;
    }
    try {
      project.renameItem(name, parsed.data.newName);
      res.json({ status: 'renamed', name: parsed.data.newName });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // POST /connections — Connect two items
  router.post('/connections', (req: Request, res: Response) => {
    const parsed = ConnectionSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    const { from, to } = parsed.data;
    const missing = [from, to].find((n) => !project.getItem(n));
    if (missing !== undefined) {
      res.status(404).json({ detail: `Item not found: ${missing}` });
      return;
    }
    if (rejectWhileRunning(res)) return;
    try {
      if (!project.connect(from, to)) {
        res.status(409).json({ detail: `Connection already exists: ${from} -> ${to}` });
        return;
      }
      res.status(201).json({ status: 'connected' });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // DELETE /connections — Remove a connection
  router.delete('/connections', (req: Request, res: Response) => {
    const parsed = ConnectionSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    const { from, to } = parsed.data;
    if (rejectWhileRunning(res)) return;
    try {
      if (!project.disconnect(from, to)) {
        res.status(404).json({ detail: `Connection not found: ${from} -> ${to}` });
        return;
      }
      res.json({ status: 'disconnected' });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // POST /execute — Run graphs
  router.post('/execute', async (req: Request, res: Response) => {
    const parsed = ExecuteBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    if (rejectWhileRunning(res)) return;
    const { selected, wait } = parsed.data;
    const unknown = (selected ?? []).filter((n) => !project.getItem(n));
    if (unknown.length > 0) {
      res.status(404).json({ detail: `Item not found: ${unknown.join(', ')}` });
      return;
    }

    const run = selected ? project.executeSelected(selected) : project.executeAll();
    if (!wait) {
      run.catch((err: unknown) => {
        project.logger.error('Execution failed', { error: errorMessage(err) });
      });
      res.status(202).json({ status: 'started' });
      return;
    }
    try {
      res.json(await run);
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // POST /stop — Stop the current run
  router.post('/stop', (_req: Request, res: Response) => {
    const stopped = project.stop();
    res.json({ status: stopped ? 'stopping' : 'idle' });
  });

  // POST /export — Export graphs
  router.post('/export', (req: Request, res: Response) => {
    const parsed = ExportBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      res.json({ results: project.exportGraphs(parsed.data.dir) });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  // POST /save — Write project.json
  router.post('/save', (_req: Request, res: Response) => {
    try {
      project.save();
      res.json({ status: 'saved' });
    } catch (err: unknown) {
      serverError(res, err);
    }
  });

  return router;
}
