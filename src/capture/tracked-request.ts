import type { RequestDescriptor, TrackedRequest } from '../types/index.js';
import { generateId } from '../storage/base.js';

/**
 * Pair a request with the id and start time it keeps for its whole exchange
 */
export function trackRequest(
  request: RequestDescriptor,
  options: { id?: string; now?: () => number } = {}
): TrackedRequest {
  return {
    id: options.id ?? generateId(),
    startTime: (options.now ?? Date.now)(),
    request,
  };
}

/**
 * Milliseconds since the request was first observed
 */
export function elapsedSince(tracked: TrackedRequest, now: () => number = Date.now): number {
  return Math.max(0, now() - tracked.startTime);
}
