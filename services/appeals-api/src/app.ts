/**
 * Appeals API
 *
 * HTTP surface over the complaint pipeline: classification, service
 * resolution, appeal drafting and the combined /solve flow.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  parseContract,
  validateContract,
  RequestValidationError,
  type ComplaintOrchestrator,
  type ContractName,
  type ContractTypes,
} from '@civic-appeals/shared';
import { notFound, toErrorResponse } from './lib/errors';

export interface AppDependencies {
  orchestrator: () => ComplaintOrchestrator;
  checkDatabase: () => Promise<void>;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Correlation ID middleware, ahead of body parsing so parse errors carry it
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = headerValue(req.headers['x-correlation-id']) || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext(
      { correlationId, operation: req.path, classifierStrategy: config.classifierType },
      () => {
        next();
      }
    );
  });

  app.use(express.json({ limit: '64kb' }));

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.checkDatabase();

      res.json({
        status: 'healthy',
        service: 'appeals-api',
        database: 'connected',
        classifier: config.classifierType,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'appeals-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * Validate the body against its contract, run the operation and map
   * failures to an error envelope.
   */
  function handle<K extends ContractName, R>(
    contract: K,
    run: (body: ContractTypes[K], orchestrator: ComplaintOrchestrator) => Promise<R>,
    responseContract?: ContractName
  ) {
    return async (req: Request, res: Response) => {
      const correlationId = getCorrelationId();

      try {
        const body = parseContract(contract, req.body);
        const result = await run(body, deps.orchestrator());

        if (responseContract) {
          const validation = validateContract(responseContract, result);
          if (!validation.valid) {
            logger.warn('Response contract validation failed', {
              contract: responseContract,
              errors: validation.errors,
            });
          }
        }

        res.json(result);
      } catch (error) {
        if (error instanceof RequestValidationError) {
          logger.warn('Request rejected', { path: req.path, errors: error.errors });
        } else {
          logger.error('Request failed', error, { path: req.path });
        }

        const { status, body } = toErrorResponse(error, correlationId);
        res.status(status).json(body);
      }
    };
  }

  /**
   * POST /classify
   * Classify a complaint with the configured strategy
   */
  app.post(
    '/classify',
    handle('classify_request', (body, orchestrator) => orchestrator.classify(body.problem_text), 'classification_response')
  );

  /**
   * POST /resolve-service
   * Find the responsible organization for a category, urgency and address
   */
  app.post(
    '/resolve-service',
    handle('resolve_service_request', (body, orchestrator) => orchestrator.resolveService(body), 'service_resolution')
  );

  /**
   * POST /appeal/generate
   * Draft a formal appeal letter
   */
  app.post(
    '/appeal/generate',
    handle('appeal_request', (body, orchestrator) => orchestrator.draftAppeal(body))
  );

  /**
   * POST /solve
   * Classification, resolution and appeal drafting in one call
   */
  app.post(
    '/solve',
    handle('solve_request', (body, orchestrator) => orchestrator.solve(body))
  );

  app.use((req: Request, res: Response) => {
    const { status, body } = notFound(req.path, getCorrelationId());
    res.status(status).json(body);
  });

  // Malformed JSON bodies
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      const { status, body } = toErrorResponse(
        new RequestValidationError('Malformed JSON body', [err.message]),
        getCorrelationId()
      );
      res.status(status).json(body);
      return;
    }
    next(err);
  });

  return app;
}
