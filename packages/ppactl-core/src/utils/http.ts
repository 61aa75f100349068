import { logger } from './logger';

export interface HttpRequest {
  url: string;
  method: 'GET';
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  request(req: HttpRequest): Promise<HttpResponse>;
}

export interface FetchHttpConfig {
  timeoutMs: number;
}

/**
 * Single-attempt fetch client. No retry; the request is aborted after
 * `timeoutMs`.
 */
export class FetchHttpClient implements HttpClient {
  constructor(private readonly config: FetchHttpConfig) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    logger.debug('http request', { method: req.method, url: req.url });

    const resp = await fetch(req.url, {
      method: req.method,
      headers: { 'User-Agent': 'ppactl', ...req.headers },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    const body = await resp.text();

    logger.debug('http response', { url: req.url, status: resp.status });
    return { status: resp.status, body };
  }
}
