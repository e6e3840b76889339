import { fetch as undiciFetch } from 'undici';

export interface HttpRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/**
 * Outbound HTTP for the vendor clients. Under test the global fetch is used so
 * nock can intercept it.
 */
export async function httpFetch(url: string, init: HttpRequestInit): Promise<HttpResponse> {
  if (process.env.NODE_ENV === 'test') {
    return globalThis.fetch(url, init);
  }
  return undiciFetch(url, init);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Reads a short error body for logs without failing the caller.
 */
export async function readErrorBody(res: HttpResponse, max = 200): Promise<string> {
  try {
    return (await res.text()).slice(0, max);
  } catch {
    return '';
  }
}
