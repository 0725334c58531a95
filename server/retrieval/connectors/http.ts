import type { SourceError } from '../../../shared/types';
import { createDeadline } from '../../utils/async';

export type UpstreamResponse =
  | { ok: true; status: number; body: string }
  | { ok: false; error: SourceError };

export interface UpstreamRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * GET with a per-call deadline covering both the response and its body. Transport failures are
 * returned as `network` or `timeout` errors; HTTP status handling is left to the caller.
 */
export const requestUpstream = async (url: string, options: UpstreamRequestOptions): Promise<UpstreamResponse> => {
  const deadline = createDeadline(options.timeoutMs, options.signal);
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: options.headers,
      signal: deadline.signal,
    });
    const body = await response.text();
    return { ok: true, status: response.status, body };
  } catch (error) {
    if (deadline.signal.aborted) {
      return {
        ok: false,
        error: {
          kind: 'timeout',
          message: deadline.expired() ? `No response within ${options.timeoutMs} ms` : 'Request aborted',
        },
      };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: { kind: 'network', message } };
  } finally {
    deadline.dispose();
  }
};

export const errorForStatus = (status: number, detail?: string): SourceError => {
  const suffix = detail ? `: ${detail}` : '';
  if (status === 401 || status === 403) {
    return { kind: 'unauthorized', message: `Upstream rejected credentials (${status})${suffix}`, status };
  }
  if (status === 429) {
    return { kind: 'rate-limited', message: `Upstream rate limit reached${suffix}`, status };
  }
  return { kind: 'network', message: `Upstream responded ${status}${suffix}`, status };
};

export const parseJson = (body: string): unknown => {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
};

/** `"{source}: {title}. {description}"` plus the start of the body, or null when unusable. */
export const composeArticleText = (
  source: string,
  title: string | null | undefined,
  description: string | null | undefined,
  content: string | null | undefined,
): string | null => {
  const cleanTitle = title?.trim();
  const cleanDescription = description?.trim();
  if (!cleanTitle || !cleanDescription) {
    return null;
  }
  let text = `${source}: ${cleanTitle}. ${cleanDescription}`;
  const cleanContent = content?.trim();
  if (cleanContent) {
    text += ` ${cleanContent.slice(0, 200)}`;
  }
  return text.length > 50 ? text : null;
};
