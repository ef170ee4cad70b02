export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Called before each request. Receives the full URL, never the headers. */
  onRequest?: (method: string, url: string) => void;
}

export interface RequestOptions {
  method?: string;
  params?: Record<string, string | undefined>;
}

/**
 * Any transport-level failure: connection error, non-2xx status,
 * or a body that is not the JSON the caller asked for.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function buildUrl(
  baseUrl: string,
  path: string,
  params?: Record<string, string | undefined>,
): string {
  let url = `${baseUrl}${path}`;
  if (params) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") {
        searchParams.set(key, value);
      }
    }
    const qs = searchParams.toString();
    if (qs) url += `?${qs}`;
  }
  return url;
}

function causeMessage(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  // undici wraps the socket error: "fetch failed" { cause: ECONNREFUSED ... }
  if (e.cause instanceof Error) return `${e.message} (${e.cause.message})`;
  return e.message;
}

export class HttpClient {
  constructor(private opts: HttpOptions) {}

  async request<T = unknown>(
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const { method = "GET", params } = options;
    const url = buildUrl(this.opts.baseUrl, path, params);
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...this.opts.headers,
    };

    this.opts.onRequest?.(method, url);

    let res: Response;
    try {
      res = await fetch(url, { method, headers });
    } catch (e: unknown) {
      throw new HttpError(`${method} ${path}: ${causeMessage(e)}`);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new HttpError(`HTTP ${res.status} ${method} ${path}: ${text}`, res.status);
    }

    const text = await res.text();
    try {
      return JSON.parse(text) as T;
    } catch (e: unknown) {
      throw new HttpError(
        `Invalid JSON from ${method} ${path}: ${causeMessage(e)}`,
        res.status,
      );
    }
  }

  async get<T = unknown>(path: string, params?: Record<string, string | undefined>): Promise<T> {
    return this.request<T>(path, { params });
  }
}
