/**
 * Admin HTTP service
 * Guild configuration, manual test posts and status over HTTP
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { timingSafeEqual } from 'crypto';
import { RelayError, RelayErrorType } from '../system/error-handling';
import { RelayLogger, createModuleLogger } from '../system/logger';
import { SchedulerStatus } from '../system/scheduler';
import { DispatchOutcome } from '../system/dispatcher';
import { GuildCommands, GuildSummary } from '../guilds/commands';

export interface StatusSource {
  scheduler(): SchedulerStatus;
  cacheSize(): number;
  activeDispatches(): number;
  history(): Map<string, DispatchOutcome[]>;
}

export interface AdminServiceOptions {
  port: number;
  token: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function statusFor(error: RelayError): number {
  switch (error.type) {
    case RelayErrorType.CONFIGURATION_ERROR:
    case RelayErrorType.CREDENTIAL_MISSING:
    case RelayErrorType.DESTINATION_UNRESOLVABLE:
      return 400;
    case RelayErrorType.PERSISTENCE_FAILURE:
      return 503;
    default:
      return 500;
  }
}

function bodyString(req: Request, field: string): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && field in body) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
  }
  return '';
}

function bodyInteger(req: Request, field: string): number {
  const raw = bodyString(req, field);
  return raw === '' ? NaN : Number(raw);
}

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class AdminService {
  private readonly app: Application;
  private readonly logger: RelayLogger;
  private readonly port: number;
  private readonly token: string;
  private server: Server | null = null;

  constructor(
    private readonly commands: GuildCommands,
    private readonly status: StatusSource,
    options: AdminServiceOptions,
    logger: RelayLogger = createModuleLogger('admin')
  ) {
    this.logger = logger;
    this.port = options.port;
    this.token = options.token;
    this.app = express();
    this.app.use(express.json());
    this.setupRoutes();
  }

  get application(): Application {
    return this.app;
  }

  /**
   * Port actually bound, which differs from the configured one when that is 0
   */
  get boundPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`Admin service listening on port ${this.port}`);
        resolve();
      });
      server.on('error', (error: Error) => {
        this.logger.error('Admin service failed to start', error);
        reject(error);
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Admin service stopped');
        resolve();
      });
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      res.json({ status: 'healthy', timestamp: new Date().toISOString(), uptime: process.uptime() });
    });

    this.app.get('/status', (_req, res) => {
      const history: Record<string, DispatchOutcome[]> = {};
      for (const [guildId, outcomes] of this.status.history()) {
        history[guildId] = outcomes;
      }
      res.json({
        scheduler: this.status.scheduler(),
        cacheSize: this.status.cacheSize(),
        activeDispatches: this.status.activeDispatches(),
        history
      });
    });

    this.app.use('/guilds', this.requireToken);

    this.app.get('/guilds', (_req, res) => {
      res.json(this.commands.list());
    });

    this.app.get('/guilds/:guildId', (req, res) => {
      res.json(this.commands.describe(req.params.guildId));
    });

    this.app.put(
      '/guilds/:guildId/channel',
      this.wrap(async (req, res) => {
        res.json(await this.commands.setChannel(req.params.guildId, bodyString(req, 'channelId')));
      })
    );

    this.app.put(
      '/guilds/:guildId/api-key',
      this.wrap(async (req, res) => {
        res.json(await this.commands.setApiKey(req.params.guildId, bodyString(req, 'apiKey')));
      })
    );

    this.app.put(
      '/guilds/:guildId/time',
      this.wrap(async (req, res) => {
        const minute = bodyString(req, 'minute') === '' ? 0 : bodyInteger(req, 'minute');
        res.json(await this.commands.setPostTime(req.params.guildId, bodyInteger(req, 'hour'), minute));
      })
    );

    this.app.put(
      '/guilds/:guildId/mention',
      this.wrap(async (req, res) => {
        const roleId = bodyString(req, 'roleId');
        res.json(await this.commands.setMention(req.params.guildId, bodyString(req, 'mode'), roleId || null));
      })
    );

    this.app.post(
      '/guilds/:guildId/test',
      this.wrap(async (req, res) => {
        const summary: GuildSummary = this.commands.triggerTest(req.params.guildId);
        res.status(202).json({ queued: true, guild: summary });
      })
    );

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found', path: req.path });
    });

    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof RelayError) {
        res.status(statusFor(err)).json({ error: err.type, message: err.message });
        return;
      }
      this.logger.error('Admin request failed', err, { path: req.path });
      res.status(500).json({ error: 'internal_error', message: err.message });
    });
  }

  /**
   * Every /guilds route needs `Authorization: Bearer <token>`; with no token configured nothing passes
   */
  private readonly requireToken = (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get('authorization') ?? '';
    const presented = header.startsWith('Bearer ') ? header.slice('Bearer '.length) : '';
    if (!this.token || !tokensMatch(presented, this.token)) {
      this.logger.warn('Rejected admin request without a valid token', { method: req.method, path: req.originalUrl });
      res.status(401).json({ error: 'unauthorized', message: 'A valid admin token is required' });
      return;
    }
    next();
  };

  private wrap(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };
  }
}
