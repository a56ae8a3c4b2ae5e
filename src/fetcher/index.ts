/**
 * A fetched HTTP response body with its metadata.
 */
export interface FetchedPage {
  /** The URL that was requested. */
  url: string;
  /** The URL the body was served from, after redirects. */
  finalUrl: string;
  status: number;
  body: string;
  headers: Record<string, string>;
  fetchedAt: Date;
}

/**
 * The fetch capability used by the crawler.
 */
export interface Fetcher {
  /**
   * Fetch a URL. Non-2xx responses resolve with their status; transport
   * failures reject with a FetchError.
   */
  fetch(url: string): Promise<FetchedPage>;
  /** Abort requests still in flight. */
  close(): void;
}

/**
 * Options for `createFetcher`.
 */
export interface FetcherOptions {
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  headers?: Record<string, string>;
}

/** Default User-Agent sent with every request. */
export const DEFAULT_USER_AGENT = 'depth-crawler/1.0';

/** Maximum number of redirects to follow. */
const MAX_REDIRECTS = 5;

/** Content types considered as HTML. */
const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Error thrown when a fetch cannot produce a usable response.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Convert a Response's headers to a plain object.
 */
function responseHeadersToRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

function isHtml(response: Response): boolean {
  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => contentType.includes(type));
}

/**
 * Read the charset label of a Content-Type header, if it names one.
 */
export function charsetFromContentType(contentType: string | null): string | undefined {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '');
  return match?.[1];
}

/**
 * Decode a body by its declared charset; unknown labels fall back to UTF-8.
 */
export function decodeBody(bytes: ArrayBuffer | Uint8Array, charset: string | undefined): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset ?? 'utf-8');
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever
 * comes first. A body that stalls after its headers is only interrupted
 * this way.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Create a Fetcher backed by the global `fetch`.
 *
 * Redirects are followed manually (up to 5) so the final URL is known.
 * The timeout covers the whole page: every redirect hop and the body.
 * There is no retry: every failure is reported to the caller once.
 */
export function createFetcher(options: FetcherOptions): Fetcher {
  const requestHeaders: Record<string, string> = {
    'User-Agent': DEFAULT_USER_AGENT,
    ...options.headers,
  };
  const controllers = new Set<AbortController>();

  /**
   * Issue a single GET without following redirects.
   */
  async function request(
    url: string,
    requestedUrl: string,
    signal: AbortSignal,
  ): Promise<Response> {
    try {
      return await fetch(url, {
        headers: requestHeaders,
        signal,
        redirect: 'manual',
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new FetchError(
        `Network error fetching ${url}: ${error instanceof Error ? error.message : String(error)}`,
        requestedUrl,
      );
    }
  }

  async function readBody(
    response: Response,
    url: string,
    signal: AbortSignal,
  ): Promise<string> {
    let bytes: ArrayBuffer;
    try {
      bytes = await response.arrayBuffer();
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new FetchError(
        `Failed to read body of ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        response.status,
      );
    }
    return decodeBody(bytes, charsetFromContentType(response.headers.get('content-type')));
  }

  async function getPage(url: string, signal: AbortSignal): Promise<FetchedPage> {
    let currentUrl = url;
    let response = await request(currentUrl, url, signal);

    for (let redirectCount = 0; response.status >= 300 && response.status < 400; redirectCount++) {
      const location = response.headers.get('location');
      if (!location) {
        throw new FetchError(
          `Redirect response missing Location header: ${currentUrl}`,
          url,
          response.status,
        );
      }
      if (redirectCount === MAX_REDIRECTS) {
        throw new FetchError(
          `Too many redirects (max ${MAX_REDIRECTS}): ${url}`,
          url,
          response.status,
        );
      }
      try {
        currentUrl = new URL(location, currentUrl).href;
      } catch {
        throw new FetchError(
          `Invalid redirect location "${location}": ${currentUrl}`,
          url,
          response.status,
        );
      }
      response = await request(currentUrl, url, signal);
    }

    if (response.ok && !isHtml(response)) {
      throw new FetchError(
        `Non-HTML content type (${response.headers.get('content-type') ?? 'none'}): ${currentUrl}`,
        url,
        response.status,
      );
    }

    return {
      url,
      finalUrl: currentUrl,
      status: response.status,
      body: await readBody(response, url, signal),
      headers: responseHeadersToRecord(response),
      fetchedAt: new Date(),
    };
  }

  return {
    async fetch(url: string): Promise<FetchedPage> {
      const controller = new AbortController();
      controllers.add(controller);
      let timedOut = false;
      const timeout = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs);

      try {
        return await untilAborted(getPage(url, controller.signal), controller.signal);
      } catch (error) {
        if (timedOut) {
          throw new FetchError(
            `Request timed out after ${options.timeoutMs}ms: ${url}`,
            url,
          );
        }
        if (controller.signal.aborted) {
          throw new FetchError(`Request aborted: ${url}`, url);
        }
        throw error;
      } finally {
        clearTimeout(timeout);
        controllers.delete(controller);
      }
    },

    close(): void {
      for (const controller of controllers) {
        controller.abort();
      }
      controllers.clear();
    },
  };
}
