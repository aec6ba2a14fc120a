import type { CaptureInput, RequestDescriptor, TrackedRequest } from '../types/index.js';
import type { FaultInjector } from '../chaos/index.js';
import { getStatusText, NetworkFailureError } from '../chaos/failure.js';
import { finalStatusCode } from '../chaos/rewrite.js';
import type { CaptureStore } from '../capture/store.js';
import { elapsedSince, trackRequest } from '../capture/tracked-request.js';

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * What an interceptor needs from the host instance
 */
export interface InterceptionTargets {
  getInjector(): FaultInjector;
  getCaptureStore(): CaptureStore;
}

export interface InterceptedFetchOptions {
  /** Receives capture failures that happen after the response was handed back */
  onError?: (error: Error) => void;
}

// Statuses a fetch Response cannot carry a body with
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

// Upstream headers that stop describing the body once it is replaced
const BODY_HEADERS = ['content-length', 'content-encoding'];

/**
 * Wrap a fetch implementation so every call goes through delay, failure,
 * rewrite and capture.
 */
export function createInterceptedFetch(
  targets: InterceptionTargets,
  fetchImpl: FetchLike = fetch,
  options: InterceptedFetchOptions = {}
): FetchLike {
  return async (input, init) => {
    const injector = targets.getInjector();
    const captures = targets.getCaptureStore();
    const tracked = trackRequest(describeFetchRequest(input, init));

    await injector.applyDelay(tracked.request);

    const decision = injector.decideFailure(tracked.request);
    if (decision.inject) {
      if (decision.kind.type !== 'httpError') {
        captures.addRecord(failedRecord(tracked, decision.error));
        throw decision.error;
      }

      const status = decision.statusCode ?? 500;
      const body = JSON.stringify({ error: getStatusText(status), message: decision.error.message, injected: true });
      const synthesized = buildResponse(body, status, { 'content-type': 'application/json' });
      return finish(targets, tracked, synthesized, options, body);
    }

    let response: Response;
    try {
      response = await fetchImpl(input, init);
    } catch (error) {
      captures.addRecord(failedRecord(tracked, error));
      throw error;
    }

    return finish(targets, tracked, response, options);
  };
}

/**
 * Apply the rewrite rule and capture the exchange. The response goes back to
 * the caller without waiting for its body; real bodies are captured once they
 * have been read in full.
 */
async function finish(
  targets: InterceptionTargets,
  tracked: TrackedRequest,
  response: Response,
  options: InterceptedFetchOptions,
  knownBody?: string
): Promise<Response> {
  const rule = targets.getInjector().matchingRewriteRule(tracked.request);
  if (rule) {
    try {
      await response.body?.cancel();
    } catch (error) {
      options.onError?.(new Error(`Failed to release replaced response body: ${errorMessage(error)}`));
    }

    const headers = new Headers(response.headers);
    for (const name of BODY_HEADERS) {
      headers.delete(name);
    }
    const rewritten = buildResponse(rule.responseBody, rule.responseStatusCode ?? response.status, headers);
    addCapture(targets, tracked, rewritten, rule.responseBody);
    return rewritten;
  }

  if (knownBody !== undefined || response.body === null) {
    addCapture(targets, tracked, response, knownBody);
    return response;
  }

  response
    .clone()
    .arrayBuffer()
    .then((buffer) => addCapture(targets, tracked, response, new Uint8Array(buffer)))
    .catch((error: unknown) => {
      options.onError?.(new Error(`Failed to capture response body: ${errorMessage(error)}`));
    });

  return response;
}

function addCapture(
  targets: InterceptionTargets,
  tracked: TrackedRequest,
  response: Response,
  body: string | Uint8Array | undefined
): void {
  const responseBytes =
    response.body === null || body === undefined
      ? undefined
      : typeof body === 'string'
        ? new TextEncoder().encode(body)
        : body;

  targets.getCaptureStore().addRecord({
    id: tracked.id,
    url: tracked.request.url,
    method: tracked.request.method,
    statusCode: response.status,
    requestBytes: tracked.request.body,
    responseBytes,
    startTime: tracked.startTime,
    duration: elapsedSince(tracked),
  });
}

function buildResponse(body: string, status: number, headers: ResponseInit['headers']): Response {
  const safeStatus = finalStatusCode(status);
  return new Response(NULL_BODY_STATUSES.has(safeStatus) ? null : body, {
    status: safeStatus,
    statusText: getStatusText(safeStatus),
    headers,
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failedRecord(tracked: TrackedRequest, error: unknown): CaptureInput {
  const details =
    error instanceof NetworkFailureError
      ? { domain: error.domain, code: error.code, message: error.message }
      : { domain: 'faultline.fetch', code: -1, message: errorMessage(error) };

  return {
    id: tracked.id,
    url: tracked.request.url,
    method: tracked.request.method,
    requestBytes: tracked.request.body,
    startTime: tracked.startTime,
    duration: elapsedSince(tracked),
    error: details,
  };
}

function describeFetchRequest(input: string | URL | Request, init?: RequestInit): RequestDescriptor {
  const isRequest = typeof input === 'object' && 'method' in input;
  const url = typeof input === 'string' ? input : isRequest ? input.url : input.toString();
  const method = (init?.method ?? (isRequest ? input.method : 'GET')).toUpperCase();

  const headers: Record<string, string> = {};
  new Headers(init?.headers ?? (isRequest ? input.headers : undefined)).forEach((value, key) => {
    headers[key] = value;
  });

  return { url, method, headers, body: bodyBytes(init?.body) };
}

function bodyBytes(body: RequestInit['body']): Uint8Array | undefined {
  if (typeof body === 'string') {
    return new TextEncoder().encode(body);
  }
  if (body instanceof Uint8Array) {
    return body;
  }
  if (body instanceof ArrayBuffer) {
    return new Uint8Array(body);
  }
  if (body instanceof URLSearchParams) {
    return new TextEncoder().encode(body.toString());
  }
  return undefined;
}
