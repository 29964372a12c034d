import { z } from "zod";
import type { EventMatcher } from "../cdp/types";

const RequestWillBeSentSchema = z.object({
  requestId: z.string(),
  frameId: z.string().optional(),
  type: z.string().optional(),
  request: z.object({
    url: z.string(),
    method: z.string(),
  }),
});

const ResponseReceivedSchema = z.object({
  requestId: z.string(),
  frameId: z.string().optional(),
  type: z.string().optional(),
  response: z.object({
    url: z.string(),
    status: z.number(),
    statusText: z.string().optional(),
  }),
});

export interface NetworkRequest {
  requestId: string;
  url: string;
  method: string;
  frameId?: string;
  resourceType?: string;
}

export interface NetworkResponse {
  requestId: string;
  url: string;
  status: number;
  statusText: string;
  frameId?: string;
  resourceType?: string;
}

/** Exact URL, URL pattern, or a predicate over the parsed value. */
export type UrlOrPredicate<T> = string | RegExp | ((value: T) => boolean);

function matches<T extends { url: string }>(
  value: T,
  match: UrlOrPredicate<T>
): boolean {
  if (typeof match === "string") {
    return value.url === match;
  }
  if (match instanceof RegExp) {
    return match.test(value.url);
  }
  return match(value);
}

export function requestMatcher(
  match: UrlOrPredicate<NetworkRequest>
): EventMatcher<NetworkRequest> {
  return (params) => {
    const parsed = RequestWillBeSentSchema.safeParse(params);
    if (!parsed.success) {
      return undefined;
    }
    const request: NetworkRequest = {
      requestId: parsed.data.requestId,
      url: parsed.data.request.url,
      method: parsed.data.request.method,
      frameId: parsed.data.frameId,
      resourceType: parsed.data.type,
    };
    return matches(request, match) ? request : undefined;
  };
}

export function responseMatcher(
  match: UrlOrPredicate<NetworkResponse>
): EventMatcher<NetworkResponse> {
  return (params) => {
    const parsed = ResponseReceivedSchema.safeParse(params);
    if (!parsed.success) {
      return undefined;
    }
    const response: NetworkResponse = {
      requestId: parsed.data.requestId,
      url: parsed.data.response.url,
      status: parsed.data.response.status,
      statusText: parsed.data.response.statusText ?? "",
      frameId: parsed.data.frameId,
      resourceType: parsed.data.type,
    };
    return matches(response, match) ? response : undefined;
  };
}
