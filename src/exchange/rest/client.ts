import { errors as undiciErrors, request as undiciRequest, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { GatewayTimeoutError } from '../../errors.js';
import { createChildLogger } from '../../logger.js';
import { createAuthToken, sha512Params } from './auth.js';

const log = createChildLogger('rest-client');

const RAW_LOG_LIMIT = 2000;

export interface RestClientOptions {
  readonly baseUrl: string;
  readonly accessKey: string;
  readonly secretKey: string;
  readonly timeoutMs: number;
  /** 테스트에서 undici MockAgent 주입 */
  readonly dispatcher?: Dispatcher;
}

/**
 * HTTP 레벨 실패
 * - retryable: 서버가 요청을 처리하지 않은 것이 확실 (429, 연결 실패)
 * - outcomeUnknown: 요청이 처리됐는지 알 수 없음 (5xx, 응답 도중 끊김)
 */
export class RestRequestError extends Error {
  readonly statusCode: number | null;
  readonly retryable: boolean;
  readonly outcomeUnknown: boolean;

  constructor(
    message: string,
    details: { statusCode: number | null; retryable: boolean; outcomeUnknown: boolean; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = 'RestRequestError';
    this.statusCode = details.statusCode;
    this.retryable = details.retryable;
    this.outcomeUnknown = details.outcomeUnknown;
  }
}

function isAuthError(status: number): boolean {
  return status === 401 || status === 403;
}

function isTimeout(err: unknown): boolean {
  return err instanceof undiciErrors.HeadersTimeoutError || err instanceof undiciErrors.BodyTimeoutError;
}

/** 연결 단계 실패 — 요청이 서버에 도달하지 않음 */
function isConnectFailure(err: unknown): boolean {
  if (err instanceof undiciErrors.ConnectTimeoutError) return true;
  if (err instanceof Error && 'code' in err) {
    return err.code === 'ECONNREFUSED' || err.code === 'ENOTFOUND' || err.code === 'EAI_AGAIN';
  }
  return false;
}

function parseBody(text: string): unknown {
  if (text === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    return { _rawBody: text };
  }
}

/**
 * 브로커 REST 클라이언트
 * URL은 endpoints 상수만 사용. 재시도는 호출 측 RetryPolicy에서 처리 (여기서는 한 번만 요청)
 */
export class BrokerRestClient {
  private readonly options: RestClientOptions;

  constructor(options: RestClientOptions) {
    this.options = options;
  }

  get hasCredentials(): boolean {
    return this.options.accessKey !== '' && this.options.secretKey !== '';
  }

  /** Public GET + zod 검증 */
  async getPublic<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = this.buildUrl(path, query);
    const raw = await this.send(url, 'GET', { Accept: 'application/json' });
    return this.validate(path, raw, schema, false);
  }

  /**
   * Private 요청 — Authorization: Bearer <JWT>, JWT는 매 요청 새로 생성
   * 파라미터(쿼리 또는 body)가 있으면 query_hash 포함
   */
  async requestPrivate<T>(
    path: string,
    options: { method: 'GET' | 'POST'; query?: Record<string, string>; body?: Record<string, string> },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const query = options.query ?? {};
    const url = this.buildUrl(path, query);
    const hasBody = options.body !== undefined && Object.keys(options.body).length > 0;
    const hashed = hasBody ? options.body : Object.keys(query).length > 0 ? query : undefined;
    const token = await createAuthToken(this.options.accessKey, this.options.secretKey, {
      queryHash: hashed ? sha512Params(hashed) : undefined,
    });

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (hasBody) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json; charset=utf-8';
    }
    const raw = await this.send(url, options.method, headers, body);
    // 2xx 주문 응답이 깨졌으면 접수 여부를 알 수 없음
    return this.validate(path, raw, schema, options.method === 'POST');
  }

  private buildUrl(path: string, query: Record<string, string>): URL {
    const url = new URL(path, this.options.baseUrl);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    return url;
  }

  private async send(
    url: URL,
    method: 'GET' | 'POST',
    headers: Record<string, string>,
    body?: string,
  ): Promise<unknown> {
    const timeout = this.options.timeoutMs;
    let statusCode: number;
    let text: string;
    try {
      const res = await undiciRequest(url, {
        method,
        headers,
        body,
        bodyTimeout: timeout,
        headersTimeout: timeout,
        dispatcher: this.options.dispatcher,
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (err) {
      if (isTimeout(err)) {
        throw new GatewayTimeoutError(`${method} ${url.pathname}`, timeout);
      }
      const connectFailure = isConnectFailure(err);
      throw new RestRequestError(`${method} ${url.pathname} failed: ${err instanceof Error ? err.message : String(err)}`, {
        statusCode: null,
        retryable: connectFailure,
        outcomeUnknown: !connectFailure,
        cause: err,
      });
    }

    const raw = parseBody(text);
    if (statusCode >= 200 && statusCode < 300) return raw;

    if (isAuthError(statusCode)) {
      log.error({ statusCode, path: url.pathname }, 'Auth error, check API key/secret (401/403)');
    } else {
      log.warn({ statusCode, path: url.pathname, body: text.slice(0, RAW_LOG_LIMIT) }, 'Request failed');
    }
    throw new RestRequestError(`${method} ${url.pathname} returned HTTP ${statusCode}`, {
      statusCode,
      retryable: statusCode === 429,
      outcomeUnknown: statusCode >= 500,
    });
  }

  /** zod 검증 — 실패 시 raw 로그 후 throw */
  private validate<T>(
    path: string,
    raw: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    outcomeUnknown: boolean,
  ): T {
    const result = schema.safeParse(raw);
    if (result.success) return result.data;
    log.warn(
      { path, raw: JSON.stringify(raw).slice(0, RAW_LOG_LIMIT) },
      'Response validation failed; raw dump',
    );
    throw new RestRequestError(`Response validation failed for ${path}: ${result.error.message}`, {
      statusCode: null,
      retryable: false,
      outcomeUnknown,
    });
  }
}
