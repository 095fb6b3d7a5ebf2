import type { IncomingHttpHeaders } from 'node:http';
import https, { type RequestOptions } from 'node:https';
import type { ReleaseFetchResult, ReleaseSourceConfig } from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';
import { parseVersion, stripTagPrefix } from '@main/services/update/VersionComparator';

export interface ReleaseHttpRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
  allowInsecureTls: boolean;
}

export interface ReleaseHttpResponse {
  status: number;
  text(): Promise<string>;
}

export type ReleaseTransport = (url: string, request: ReleaseHttpRequest) => Promise<ReleaseHttpResponse>;

export interface InsecureResponse extends NodeJS.EventEmitter {
  statusCode?: number;
  headers: IncomingHttpHeaders;
  resume(): unknown;
}

export interface InsecureRequest {
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type InsecureGet = (
  url: string,
  options: RequestOptions,
  callback: (response: InsecureResponse) => void
) => InsecureRequest;

interface ReleaseClientOptions extends ReleaseSourceConfig {
  logger: AppLogger;
  transport?: ReleaseTransport;
}

const MAX_REDIRECTS = 3;

export class ReleaseClient {
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly allowInsecureTls: boolean;
  private readonly logger: AppLogger;
  private readonly transport: ReleaseTransport;

  constructor(options: ReleaseClientOptions) {
    const apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
    this.endpoint = `${apiBaseUrl}/repos/${encodeURIComponent(options.owner)}/${encodeURIComponent(options.repo)}/releases/latest`;
    this.userAgent = options.userAgent;
    this.timeoutMs = Math.max(1, Math.trunc(options.timeoutMs));
    this.allowInsecureTls = options.allowInsecureTls;
    this.logger = options.logger;
    this.transport = options.transport ?? createDefaultTransport();
  }

  async fetchLatestRelease(token: string | null): Promise<ReleaseFetchResult> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/vnd.github.v3+json'
    };
    if (token) {
      headers.Authorization = `token ${token}`;
    }

    if (this.allowInsecureTls) {
      this.logger.warn('update.release.tls_verification_disabled', { url: this.endpoint });
    }
    this.logger.debug('update.release.request', { url: this.endpoint, authenticated: Boolean(token) });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let body: string;
    try {
      const response = await this.transport(this.endpoint, {
        headers,
        signal: controller.signal,
        allowInsecureTls: this.allowInsecureTls
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timeout apos ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      this.logger.error('update.release.connection_failed', { url: this.endpoint, reason });
      return { ok: false, error: { kind: 'connection_failed', reason } };
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug('update.release.response', { status, bytes: body.length });

    if (status === 401) {
      this.logger.error('update.release.auth_failed', { status });
      return { ok: false, error: { kind: 'auth_failed' } };
    }

    if (status === 404) {
      // repo privado sem token, nome errado ou nenhuma release publicada
      this.logger.warn('update.release.not_found', { status, authenticated: Boolean(token) });
      return { ok: false, error: { kind: 'not_found' } };
    }

    if (status !== 200) {
      this.logger.error('update.release.api_error', { status });
      return { ok: false, error: { kind: 'api_error', status } };
    }

    const tagName = readTagName(body);
    if (!tagName.ok) {
      this.logger.error('update.release.invalid_response', { reason: tagName.reason, preview: body.slice(0, 200) });
      return { ok: false, error: { kind: 'invalid_response', reason: tagName.reason } };
    }

    return {
      ok: true,
      release: {
        rawTag: tagName.value,
        tagVersion: parseVersion(stripTagPrefix(tagName.value))
      }
    };
  }
}

function readTagName(body: string): { ok: true; value: string } | { ok: false; reason: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { ok: false, reason: 'corpo nao e JSON valido' };
  }

  if (typeof parsed !== 'object' || parsed === null || !('tag_name' in parsed)) {
    return { ok: false, reason: 'tag_name ausente' };
  }

  const tagName = parsed.tag_name;
  if (typeof tagName !== 'string' || !tagName.trim()) {
    return { ok: false, reason: 'tag_name invalido' };
  }

  return { ok: true, value: tagName.trim() };
}

export function createDefaultTransport(options?: { insecureGet?: InsecureGet }): ReleaseTransport {
  const insecureGet = options?.insecureGet ?? https.get;

  return async (url, request) => {
    if (request.allowInsecureTls) {
      return requestWithoutTlsVerification(insecureGet, url, request, MAX_REDIRECTS);
    }

    return fetch(url, {
      headers: request.headers,
      signal: request.signal,
      redirect: 'follow'
    });
  };
}

function requestWithoutTlsVerification(
  get: InsecureGet,
  url: string,
  request: ReleaseHttpRequest,
  redirectsLeft: number
): Promise<ReleaseHttpResponse> {
  return new Promise((resolve, reject) => {
    const req = get(
      url,
      {
        headers: request.headers,
        signal: request.signal,
        rejectUnauthorized: false
      },
      (res) => {
        const status = res.statusCode ?? 0;
        const location = res.headers.location;
        if (status >= 300 && status < 400 && location && redirectsLeft > 0) {
          res.resume();
          requestWithoutTlsVerification(get, new URL(location, url).toString(), request, redirectsLeft - 1).then(
            resolve,
            reject
          );
          return;
        }

        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          const body = Buffer.concat(chunks).toString('utf-8');
          resolve({ status, text: async () => body });
        });
      }
    );
    req.on('error', reject);
  });
}
