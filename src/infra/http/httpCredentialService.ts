import { CredentialService, RawSessionPayload } from '../../application/auth/ports.js';
import {
  NetworkError,
  ServerError,
  UnauthorizedError,
} from '../../domain/auth/errors.js';
import { createLogger, Logger } from '../logging/logger.js';

export interface HttpCredentialServiceOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a human-readable message out of an error body: `{ message }`,
 * `{ error }` or `{ error: { message } }`.
 */
function extractMessage(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  if (typeof body.message === 'string' && body.message !== '') {
    return body.message;
  }
  if (typeof body.error === 'string' && body.error !== '') {
    return body.error;
  }
  if (isRecord(body.error) && typeof body.error.message === 'string') {
    return body.error.message;
  }
  return undefined;
}

/**
 * Read the body as text, giving up as soon as the signal aborts.
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Credential service over HTTP/JSON.
 *
 * Every failure leaves as one of UnauthorizedError, ServerError or
 * NetworkError. Requests are bounded by `timeoutMs`.
 */
export class HttpCredentialService implements CredentialService {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: HttpCredentialServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    // Resolve the global lazily so interceptors installed later still apply
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = options.logger ?? createLogger('http-credential-service');
  }

  async login(email: string, password: string): Promise<RawSessionPayload> {
    return this.post('/auth/login', { email, password });
  }

  async register(name: string, email: string, password: string): Promise<RawSessionPayload> {
    return this.post('/auth/register', { name, email, password });
  }

  private async post(endpoint: string, body: Record<string, string>): Promise<RawSessionPayload> {
    const url = `${this.baseUrl}${endpoint}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    // The timer also bounds the body read; headers alone do not end the request
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      text = await readBody(response, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.warn('Request timed out', { url, timeoutMs: this.options.timeoutMs });
        throw new NetworkError(`Request timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      this.logger.warn('Request failed', { url });
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Network error: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    return this.handleResponse(response, text);
  }

  private handleResponse(response: Response, text: string): RawSessionPayload {
    let body: unknown = undefined;
    let parseFailed = false;
    if (text !== '') {
      try {
        body = JSON.parse(text);
      } catch {
        parseFailed = true;
      }
    }

    if (response.ok) {
      if (parseFailed || body === undefined) {
        throw new ServerError('Invalid JSON response', response.status);
      }
      // Envelope responses can report failure with a 2xx status
      if (isRecord(body) && body.success === false) {
        throw new UnauthorizedError(extractMessage(body) ?? 'Authentication failed');
      }
      return body;
    }

    const message = extractMessage(body);
    this.logger.debug('Request rejected', { status: response.status });

    if (response.status === 401) {
      throw new UnauthorizedError(message ?? 'Unauthorized - Invalid credentials');
    }
    if (response.status === 403) {
      throw new UnauthorizedError(message ?? 'Forbidden - Access denied');
    }
    if (response.status >= 500) {
      throw new ServerError(message ?? `Server error: ${response.status}`, response.status);
    }
    throw new ServerError(
      message ?? `Request failed with status ${response.status}`,
      response.status
    );
  }
}
