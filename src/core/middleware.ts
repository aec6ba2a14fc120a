import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { TrackedRequest } from '../types/index.js';
import { getStatusText } from '../chaos/failure.js';
import { finalStatusCode } from '../chaos/rewrite.js';
import { elapsedSince, trackRequest } from '../capture/tracked-request.js';
import type { InterceptionTargets } from './interceptor.js';

export interface InjectionMiddlewareOptions {
  /** Requests under this path prefix pass through untouched */
  skipPrefix?: string;
}

/**
 * Express middleware for a host app: delays, fails or rewrites incoming
 * requests, then records the finished exchange.
 */
export function createInjectionMiddleware(
  targets: InterceptionTargets,
  options: InjectionMiddlewareOptions = {}
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    if (options.skipPrefix && req.path.startsWith(options.skipPrefix)) {
      return next();
    }

    try {
      const injector = targets.getInjector();
      const tracked = trackRequest({
        url: `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`,
        method: req.method,
        headers: flattenHeaders(req.headers),
        body: requestBodyBytes(req.body),
      });

      captureOnFinish(targets, tracked, res);

      await injector.applyDelay(tracked.request);

      const decision = injector.decideFailure(tracked.request);
      if (decision.inject) {
        const { error } = decision;
        if (decision.kind.type === 'httpError') {
          const status = decision.statusCode ?? 500;
          res.status(status).json({ error: getStatusText(status), message: error.message, injected: true });
        } else {
          res.status(503).json({
            error: getStatusText(503),
            message: error.message,
            domain: error.domain,
            code: error.code,
            injected: true,
          });
        }
        return;
      }

      const rule = injector.matchingRewriteRule(tracked.request);
      if (rule) {
        res.status(finalStatusCode(rule.responseStatusCode ?? 200)).send(rule.responseBody);
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Keep the body handed to res.send and add the record once the response is out
 */
function captureOnFinish(targets: InterceptionTargets, tracked: TrackedRequest, res: Response): void {
  let responseBytes: Uint8Array | undefined;
  const originalSend = res.send.bind(res);

  res.send = (body?: unknown) => {
    if (typeof body === 'string') {
      responseBytes = new TextEncoder().encode(body);
    } else if (Buffer.isBuffer(body)) {
      responseBytes = new Uint8Array(body);
    }
    return originalSend(body);
  };

  res.on('finish', () => {
    targets.getCaptureStore().addRecord({
      id: tracked.id,
      url: tracked.request.url,
      method: tracked.request.method,
      statusCode: res.statusCode,
      requestBytes: tracked.request.body,
      responseBytes,
      startTime: tracked.startTime,
      duration: elapsedSince(tracked),
    });
  });
}

function flattenHeaders(headers: Request['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      flat[key] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return flat;
}

function requestBodyBytes(body: unknown): Uint8Array | undefined {
  if (typeof body === 'string') {
    return new TextEncoder().encode(body);
  }
  if (Buffer.isBuffer(body)) {
    return new Uint8Array(body);
  }
  if (body !== undefined && body !== null && typeof body === 'object' && Object.keys(body).length > 0) {
    return new TextEncoder().encode(JSON.stringify(body));
  }
  return undefined;
}
