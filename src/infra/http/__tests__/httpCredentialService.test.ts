import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { HttpCredentialService } from '../httpCredentialService.js';
import { NetworkError, ServerError, UnauthorizedError } from '../../../domain/auth/errors.js';

const BASE_URL = 'http://auth.test/api';

const loginResponse = {
  success: true,
  message: 'Login successful',
  data: {
    id: 'u-1',
    name: 'Ada',
    email: 'ada@example.com',
    access_token: 'access-123',
  },
};

// MSW intercepts fetch in-process so the real request/response handling runs
const server = setupServer(
  http.post(`${BASE_URL}/auth/login`, () => HttpResponse.json(loginResponse)),
  http.post(`${BASE_URL}/auth/register`, () => HttpResponse.json(loginResponse, { status: 201 }))
);

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('HttpCredentialService', () => {
  const service = new HttpCredentialService({ baseUrl: BASE_URL, timeoutMs: 5000 });

  describe('login', () => {
    it('should post the credentials as JSON and return the body', async () => {
      let received: unknown;
      let contentType: string | null = null;
      server.use(
        http.post(`${BASE_URL}/auth/login`, async ({ request }) => {
          received = await request.json();
          contentType = request.headers.get('content-type');
          return HttpResponse.json(loginResponse);
        })
      );

      const body = await service.login('ada@example.com', 'password1');

      expect(body).toEqual(loginResponse);
      expect(received).toEqual({ email: 'ada@example.com', password: 'password1' });
      expect(contentType).toBe('application/json');
    });

    it('should tolerate a trailing slash on the base URL', async () => {
      const slashed = new HttpCredentialService({ baseUrl: `${BASE_URL}/`, timeoutMs: 5000 });

      await expect(slashed.login('ada@example.com', 'password1')).resolves.toEqual(loginResponse);
    });

    it('should map 401 to UnauthorizedError with the server message', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () =>
          HttpResponse.json({ error: 'Invalid email or password' }, { status: 401 })
        )
      );

      const attempt = service.login('ada@example.com', 'wrong');

      await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(attempt).rejects.toThrow('Invalid email or password');
    });

    it('should use a default message for a bare 401', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () => new HttpResponse(null, { status: 401 }))
      );

      await expect(service.login('ada@example.com', 'wrong')).rejects.toThrow(
        'Unauthorized - Invalid credentials'
      );
    });

    it('should map 403 to UnauthorizedError', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () => new HttpResponse(null, { status: 403 }))
      );

      const attempt = service.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(attempt).rejects.toThrow('Forbidden - Access denied');
    });

    it('should treat a 2xx envelope reporting failure as unauthorized', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () =>
          HttpResponse.json({ success: false, message: 'Account is deactivated' })
        )
      );

      const attempt = service.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(attempt).rejects.toThrow('Account is deactivated');
    });

    it('should map 5xx to ServerError', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () =>
          HttpResponse.json({ message: 'database down' }, { status: 500 })
        )
      );

      await expect(service.login('ada@example.com', 'password1')).rejects.toMatchObject({
        name: 'ServerError',
        kind: 'ServerError',
        message: 'database down',
        status: 500,
      });
    });

    it('should describe a 5xx without a body by its status', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () => new HttpResponse(null, { status: 502 }))
      );

      await expect(service.login('ada@example.com', 'password1')).rejects.toThrow(
        'Server error: 502'
      );
    });

    it('should reject a success response that is not JSON', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/login`, () => HttpResponse.text('<html>maintenance</html>'))
      );

      const attempt = service.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(ServerError);
      await expect(attempt).rejects.toThrow('Invalid JSON response');
    });

    it('should map transport failures to NetworkError', async () => {
      server.use(http.post(`${BASE_URL}/auth/login`, () => HttpResponse.error()));

      const attempt = service.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toThrow(/^Network error: /);
    });

    it('should abort and report a timeout as NetworkError', async () => {
      const hanging: typeof fetch = (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new Error('This operation was aborted'));
          });
        });
      const slow = new HttpCredentialService({ baseUrl: BASE_URL, timeoutMs: 10, fetch: hanging });

      const attempt = slow.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toThrow('Request timed out after 10ms');
    });

    it('should time out when the body stalls after the headers arrive', async () => {
      const stalled: typeof fetch = async () =>
        new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 });
      const slow = new HttpCredentialService({ baseUrl: BASE_URL, timeoutMs: 20, fetch: stalled });

      const attempt = slow.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toThrow('Request timed out after 20ms');
    });

    it('should map a body read that breaks off to NetworkError', async () => {
      const truncated: typeof fetch = async () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new TypeError('terminated'));
            },
          }),
          { status: 200 }
        );
      const broken = new HttpCredentialService({ baseUrl: BASE_URL, timeoutMs: 5000, fetch: truncated });

      const attempt = broken.login('ada@example.com', 'password1');

      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toThrow('Network error: terminated');
    });
  });

  describe('register', () => {
    it('should post name, email and password', async () => {
      let received: unknown;
      server.use(
        http.post(`${BASE_URL}/auth/register`, async ({ request }) => {
          received = await request.json();
          return HttpResponse.json(loginResponse, { status: 201 });
        })
      );

      const body = await service.register('Ada', 'ada@example.com', 'longenough1');

      expect(body).toEqual(loginResponse);
      expect(received).toEqual({ name: 'Ada', email: 'ada@example.com', password: 'longenough1' });
    });

    it('should surface other client errors as ServerError with the body message', async () => {
      server.use(
        http.post(`${BASE_URL}/auth/register`, () =>
          HttpResponse.json({ error: { message: 'Email already exists' } }, { status: 409 })
        )
      );

      await expect(
        service.register('Ada', 'ada@example.com', 'longenough1')
      ).rejects.toMatchObject({ kind: 'ServerError', message: 'Email already exists', status: 409 });
    });
  });
});
