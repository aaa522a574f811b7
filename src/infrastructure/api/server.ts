import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import * as path from 'path';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import bodyParser from 'body-parser';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Backlog } from '../../domain/backlog/entities/Feature.js';
import type { BacklogRepository } from '../../domain/backlog/repositories/BacklogRepository.js';
import type { BacklogService } from '../../domain/backlog/services/BacklogService.js';
import type { ProgressLog } from '../../domain/progress/ProgressLog.js';
import { BacklogLoadError, FeatureNotFoundError } from '../../domain/backlog/errors.js';
import { parseBacklog } from '../persistence/backlogSchema.js';

export interface ApiServices {
  backlogRepository: BacklogRepository;
  backlogService: BacklogService;
  progress: ProgressLog;
}

export interface ApiServerOptions {
  /**
   * When set, every route except /health requires `Authorization: Bearer <apiKey>`
   */
  apiKey?: string;
  rateLimitMax?: number;
}

const startBodySchema = z.object({
  sessionId: z.string().min(1).optional(),
});

const completeBodySchema = z.object({
  sessionId: z.string().min(1).optional(),
  summary: z.string().min(1),
  commitHash: z.string().min(1).optional(),
  note: z.string().min(1).optional(),
});

const linesQuerySchema = z.coerce.number().int().min(1).max(1000).default(50);

export class ApiServer {
  private app: express.Application;
  private port: number;
  private services: ApiServices;
  private options: ApiServerOptions;

  constructor(port: number, services: ApiServices, options: ApiServerOptions = {}) {
    this.app = express();
    this.port = port;
    this.services = services;
    this.options = options;
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    // Security middleware
    this.app.use(helmet());
    this.app.use(cors());

    const limiter = rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      limit: this.options.rateLimitMax ?? 100, // requests per window per IP
      standardHeaders: true,
      legacyHeaders: false,
    });
    this.app.use(limiter);

    this.app.use(bodyParser.json({ limit: '5mb' }));

    if (this.options.apiKey) {
      const expected = `Bearer ${this.options.apiKey}`;
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        if (req.path === '/health' || req.get('authorization') === expected) {
          next();
          return;
        }
        res.status(401).json({ error: 'Unauthorized' });
      });
    }
  }

  private sendError(res: Response, error: unknown, action: string): void {
    if (error instanceof FeatureNotFoundError) {
      res.status(404).json({ error: error.message });
      return;
    }
    console.error(`Error ${action}:`, error);
    res.status(500).json({ error: `Failed to ${action}` });
  }

  private setupRoutes(): void {
    const { backlogRepository, backlogService, progress } = this.services;

    this.app.get('/health', (req: Request, res: Response) => {
      res.status(200).json({ status: 'ok' });
    });

    this.app.get('/status', async (req: Request, res: Response) => {
      try {
        const backlog = await backlogService.getBacklog();
        const summary = await backlogService.getSummary();
        const next = await backlogService.getNextFeature();
        const stats = await progress.getStats();
        res.status(200).json({
          summary,
          nextFeatureId: next?.id ?? null,
          lastUpdated: backlog.lastUpdated,
          progress: stats,
        });
      } catch (error) {
        this.sendError(res, error, 'get status');
      }
    });

    this.app.get('/backlog', async (req: Request, res: Response) => {
      try {
        const backlog = await backlogService.getBacklog();
        const summary = await backlogService.getSummary();
        res.status(200).json({ summary, features: backlog.features });
      } catch (error) {
        this.sendError(res, error, 'get backlog');
      }
    });

    // Full backlog document, as stored
    this.app.get('/backlog/raw', async (req: Request, res: Response) => {
      try {
        if (!(await backlogRepository.exists())) {
          res.status(404).json({ error: 'Backlog not found' });
          return;
        }
        res.status(200).json(await backlogRepository.loadBacklog());
      } catch (error) {
        this.sendError(res, error, 'get backlog');
      }
    });

    // Replace the whole backlog
    this.app.put('/backlog', async (req: Request, res: Response) => {
      let backlog: Backlog;
      try {
        backlog = parseBacklog(req.body, 'request body');
      } catch (error) {
        if (error instanceof BacklogLoadError) {
          res.status(400).json({ error: error.message });
          return;
        }
        this.sendError(res, error, 'save backlog');
        return;
      }

      try {
        await backlogService.replaceBacklog(backlog);
        res.status(200).json({ success: true });
      } catch (error) {
        this.sendError(res, error, 'save backlog');
      }
    });

    this.app.get('/backlog/next', async (req: Request, res: Response) => {
      try {
        const feature = await backlogService.getNextFeature();
        const complete = await backlogService.isComplete();
        res.status(200).json({ feature: feature ?? null, complete });
      } catch (error) {
        this.sendError(res, error, 'get next feature');
      }
    });

    this.app.get('/backlog/:id', async (req: Request, res: Response) => {
      try {
        const feature = await backlogService.getFeature(req.params.id);
        const qualityGates = await backlogService.getResolvedQualityGates(req.params.id);
        res.status(200).json({ feature, qualityGates: qualityGates ?? null });
      } catch (error) {
        this.sendError(res, error, 'get feature');
      }
    });

    this.app.post('/backlog/:id/start', async (req: Request, res: Response) => {
      const body = startBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: body.error.issues.map(i => i.message).join('; ') });
        return;
      }

      try {
        const sessionId = body.data.sessionId ?? uuidv4();
        const result = await backlogService.startFeature(req.params.id, sessionId);
        res.status(200).json({ ...result, sessionId });
      } catch (error) {
        this.sendError(res, error, 'start feature');
      }
    });

    this.app.post('/backlog/:id/complete', async (req: Request, res: Response) => {
      const body = completeBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({
          error: body.error.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; '),
        });
        return;
      }

      try {
        const { sessionId, ...params } = body.data;
        const feature = await backlogService.completeFeature(req.params.id, sessionId ?? uuidv4(), params);
        res.status(200).json({ feature });
      } catch (error) {
        this.sendError(res, error, 'complete feature');
      }
    });

    this.app.get('/progress', async (req: Request, res: Response) => {
      const lines = linesQuerySchema.safeParse(req.query.lines);
      if (!lines.success) {
        res.status(400).json({ error: 'lines must be an integer between 1 and 1000' });
        return;
      }

      try {
        res.status(200).type('text/plain').send(await progress.readRecent(lines.data));
      } catch (error) {
        this.sendError(res, error, 'read progress');
      }
    });

    this.app.get('/progress/full', async (req: Request, res: Response) => {
      try {
        res.status(200).type('text/plain').send(await progress.readProgress());
      } catch (error) {
        this.sendError(res, error, 'read progress');
      }
    });

    this.app.get('/progress/archives', async (req: Request, res: Response) => {
      try {
        const archives = await progress.getArchiveFiles();
        res.status(200).json({ archives: archives.map(file => path.basename(file)) });
      } catch (error) {
        this.sendError(res, error, 'list progress archives');
      }
    });
  }

  /**
   * Start listening; resolves once the port is bound
   */
  public start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        console.log(`API server listening on port ${this.port}`);
        resolve(server);
      });
      server.on('error', reject);
    });
  }
}
