import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { BadRequestError, RouteNotFoundError, ServiceError, ValidationError } from './errors';
import { errorMessage, type Logger } from './logger';
import { describeIssues } from './schemas';
import type { CallContext } from './types';

export const REQUEST_ID_HEADER = 'x-request-id';

export const SERVICE_VERSION = '1.0.0';

export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function requestContext(res: Response): CallContext {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? { requestId } : {};
}

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Builds an Express app with the pieces every service shares: JSON bodies,
 * request ids, `/health`, and the trailing 404 and error handlers around the
 * service's own routes.
 */
export function createServiceApp(serviceName: string, logger: Logger, mountRoutes: (app: Express) => void): Express {
  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? uuidv4();
    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);
    logger.debug(`${req.method} ${req.originalUrl}`, { requestId });
    next();
  });

  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'healthy', service: serviceName });
  });

  mountRoutes(app);

  app.use((req, res, next) => {
    next(new RouteNotFoundError(req.method, req.path));
  });
  app.use(errorHandler(logger));

  return app;
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const log = logger.child(requestContext(res));

    let failure: ServiceError;
    if (err instanceof ServiceError) {
      failure = err;
    } else if (clientErrorStatus(err) !== undefined) {
      // body-parser rejections carry their own 4xx status
      failure = new BadRequestError(err instanceof Error ? err.message : 'Malformed request');
    } else {
      log.error(`Unhandled error on ${req.method} ${req.originalUrl}`, { error: errorMessage(err) });
      res.status(500).json({ error: 'INTERNAL', detail: 'Internal Server Error' });
      return;
    }

    const fields = { status: failure.status, code: failure.code, detail: failure.message };
    if (failure.status >= 500) log.error(`${req.method} ${req.originalUrl} failed`, fields);
    else log.warn(`${req.method} ${req.originalUrl} rejected`, fields);
    res.status(failure.status).json(failure.toBody());
  };
}

export interface RunningServer {
  readonly port: number;
  readonly url: string;
  close(): Promise<void>;
}

export function startServer(app: Express, port: number, host = '127.0.0.1'): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected listen address: ${String(address)}`));
        return;
      }
      const bound: AddressInfo = address;
      resolve({
        port: bound.port,
        url: `http://${host}:${bound.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((closeErr) => (closeErr ? fail(closeErr) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}

/** Starts a service and closes it on SIGINT/SIGTERM. */
export async function runService(app: Express, port: number, logger: Logger): Promise<RunningServer> {
  const server = await startServer(app, port, '0.0.0.0');
  logger.info(`Listening on ${server.url}`);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close().then(
      () => logger.info('Server closed'),
      (err: unknown) => {
        logger.error('Error while closing server', { error: errorMessage(err) });
        process.exitCode = 1;
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}
