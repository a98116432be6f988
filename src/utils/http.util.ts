// Thin wrapper over global fetch: one GET, bounded by a timeout, no retries

interface HttpGetOptions {
  userAgent?: string;
  accept?: string;
  timeoutMs: number;
}

/** Raised when the request never produced a response (DNS, refused, timeout, abort). */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

export async function httpGet(url: string, options: HttpGetOptions): Promise<Response> {
  const headers: Record<string, string> = {};
  if (options.userAgent) headers['User-Agent'] = options.userAgent;
  if (options.accept) headers['Accept'] = options.accept;

  try {
    return await fetch(url, {
      headers,
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new NetworkError(`Request timed out after ${options.timeoutMs}ms`, url);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(message, url);
  }
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/** Reads a JSON body, returning undefined when the body is not JSON. */
export async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return undefined;
  }
}

export function describeStatus(response: Response): string {
  return response.statusText ? `HTTP ${response.status}: ${response.statusText}` : `HTTP ${response.status}`;
}
