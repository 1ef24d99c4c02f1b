import http from 'http';
import https from 'https';
import { RequestError, UpstreamError } from './errors';

// Some sites refuse requests without a browser-looking agent
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export type FetchOptions = {
  timeoutMs?: number;
  maxRedirects?: number;
};

export type FetchHtml = (url: string, opts?: FetchOptions) => Promise<string>;

type HttpResult = { status: number; location?: string; body: string };

function httpGet(url: URL, timeoutMs: number): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const options: http.RequestOptions = {
      method: 'GET',
      headers: { 'User-Agent': BROWSER_USER_AGENT, Accept: 'text/html,application/xhtml+xml,*/*;q=0.8' },
    };
    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on('data', (d: Buffer | string) => chunks.push(Buffer.isBuffer(d) ? d : Buffer.from(d)));
      res.on('end', () => resolve({
        status: res.statusCode || 0,
        location: res.headers.location,
        body: Buffer.concat(chunks).toString('utf8'),
      }));
      res.on('error', reject);
    };
    const req = url.protocol === 'https:'
      ? https.request(url, options, onResponse)
      : http.request(url, options, onResponse);
    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`Timed out after ${timeoutMs}ms fetching ${url.href}`));
    });
    req.on('error', reject);
    req.end();
  });
}

function toHttpUrl(raw: string, base?: URL): URL {
  let url: URL;
  try {
    url = new URL(raw, base);
  } catch {
    throw new RequestError(`Invalid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RequestError(`Unsupported URL protocol: ${url.protocol}`);
  }
  return url;
}

/**
 * GET a page as text. Redirects are followed; any other non-200 answer becomes an UpstreamError.
 */
export const fetchHtml: FetchHtml = async (rawUrl, opts = {}) => {
  const timeoutMs = opts.timeoutMs ?? 15000;
  const maxRedirects = opts.maxRedirects ?? 5;
  let url = toHttpUrl(rawUrl);

  for (let hop = 0; ; hop++) {
    const res = await httpGet(url, timeoutMs);
    if (REDIRECT_STATUSES.has(res.status) && res.location) {
      if (hop >= maxRedirects) throw new Error(`Too many redirects fetching ${rawUrl}`);
      url = toHttpUrl(res.location, url);
      continue;
    }
    if (res.status !== 200) throw new UpstreamError(res.status);
    return res.body;
  }
};
