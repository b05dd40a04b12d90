// packages/bridge/src/request.ts
import {
  BadRequest,
  InboundRequestSchema,
  fromZodError,
  type InboundRequest,
  type NormalizedRequest,
} from '@ddlbridge/core';

const PLACEHOLDER_ORIGIN = 'http://bridge.local';

function decodeSegment(seg: string): string {
  try {
    return decodeURIComponent(seg);
  } catch {
    throw new BadRequest(`Malformed path segment '${seg}'`);
  }
}

/**
 * Validate method/url/body and split the path into decoded segments plus an
 * optional custom action (text after the last ':').
 */
export function normalizeRequest(input: InboundRequest): NormalizedRequest {
  const parsed = InboundRequestSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, 'request');
  const { method, url, query, body } = parsed.data;

  let target: URL;
  try {
    target = new URL(url, PLACEHOLDER_ORIGIN);
  } catch {
    throw new BadRequest(`Invalid URL '${url}'`);
  }
  if (target.protocol !== 'http:' && target.protocol !== 'https:') {
    throw new BadRequest(`Invalid URL scheme '${target.protocol}'`);
  }

  let rawPath = target.pathname;
  let customAction: string | undefined;
  const cut = rawPath.lastIndexOf(':');
  if (cut >= 0) {
    customAction = decodeSegment(rawPath.slice(cut + 1));
    rawPath = rawPath.slice(0, cut);
  }

  const path = rawPath.split('/').filter(Boolean).map(decodeSegment);

  // explicit query map wins over the URL's own search string; first value per key
  const queryParams: Record<string, string> = {};
  for (const [k, v] of target.searchParams) if (!(k in queryParams)) queryParams[k] = v;
  for (const [k, v] of Object.entries(query ?? {})) queryParams[k] = Array.isArray(v) ? v[0] ?? '' : v;

  return Object.freeze({
    method,
    path: Object.freeze(path),
    customAction: customAction || undefined,
    queryParams: Object.freeze(queryParams),
    body: Object.freeze({ ...(body ?? {}) }),
  });
}
