/**
 * Express REST API Server
 * Serves the county data lookup, the measure list and the landing page
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { DEFAULT_DATABASE_FILE, DEFAULT_HOST, DEFAULT_PORT, type AppConfig } from '../config.js';
import { CountyDataService, LOOKUP_ROUTES } from '../lookup/dispatcher.js';
import { LookupError, toErrorResponse } from '../lookup/errors.js';
import { CountyHealthStore, type HealthRecordSource } from '../storage/county-health-store.js';
import { MEASURES } from '../types/index.js';
import { renderIndexPage } from './page.js';

// ============================================
// Types
// ============================================

export type ServerConfig = Pick<AppConfig, 'port' | 'host' | 'corsOrigins'> & {
  databasePath?: string;
};

/** Largest lookup body read before it is rejected as malformed */
export const LOOKUP_BODY_LIMIT = '1mb';

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private service: CountyDataService;

  /**
   * @param source - overrides the store built from `databasePath`
   */
  constructor(config: Partial<ServerConfig> = {}, source?: HealthRecordSource) {
    this.config = {
      port: DEFAULT_PORT,
      host: DEFAULT_HOST,
      corsOrigins: ['*'],
      ...config,
    };

    this.service = new CountyDataService(source ?? new CountyHealthStore(this.config.databasePath ?? DEFAULT_DATABASE_FILE));

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.corsOrigins.includes('*') ? '*' : this.config.corsOrigins,
    }));
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Landing page
    this.app.get('/', (_req: Request, res: Response) => {
      res.type('html').send(renderIndexPage());
    });

    // Health check
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    // Accepted measure names
    this.app.get('/api/measures', (_req: Request, res: Response) => {
      res.json({ measures: MEASURES });
    });

    // Lookup: read the body as text whatever its content type, so the
    // service decides what counts as JSON
    this.app.post(
      LOOKUP_ROUTES,
      express.text({ type: () => true, limit: LOOKUP_BODY_LIMIT }),
      (req: Request, res: Response) => {
        const rawBody = typeof req.body === 'string' ? req.body : undefined;
        const { status, body } = this.service.handle(rawBody);
        res.status(status).json(body);
      },
      // A body that cannot be read (too large, unknown charset) is malformed
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        const { status, body } = toErrorResponse(new LookupError('MalformedBody', { cause: err }));
        res.status(status).json(body);
      }
    );

    this.app.all(LOOKUP_ROUTES, (_req: Request, res: Response) => {
      res.status(405).json({ error: 'Method not allowed' });
    });

    // Unknown route
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Error handler
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      const status = 'status' in err && typeof err.status === 'number' && err.status < 500
        ? err.status
        : 500;
      if (status === 500) {
        console.error('API Error:', err);
      }
      res.status(status).json({ error: status === 500 ? 'Internal server error' : err.message });
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }
}
