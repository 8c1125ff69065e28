import request from 'supertest';
import { createTestApp, TestApp } from './helpers/test-app';

describe('App (e2e)', () => {
  let ctx: TestApp;

  beforeAll(async () => {
    ctx = await createTestApp();
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  it('serves the home page', () => {
    return request(ctx.app.getHttpServer())
      .get('/')
      .expect(200)
      .expect({ Message: 'Welcome to Jewelify home page' });
  });

  it('reports health', () => {
    return request(ctx.app.getHttpServer()).get('/health').expect(200).expect({ status: 'healthy' });
  });

  it('renders unknown routes with the error envelope', async () => {
    const response = await request(ctx.app.getHttpServer()).get('/undefined-route').expect(404);

    expect(response.body).toEqual({
      statusCode: 404,
      detail: 'Cannot GET /undefined-route',
      path: '/undefined-route',
      timestamp: expect.any(String),
    });
  });

  it('allows cross-origin requests', async () => {
    const response = await request(ctx.app.getHttpServer())
      .get('/health')
      .set('Origin', 'https://app.example.com')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('https://app.example.com');
  });

  describe('client addresses behind a proxy', () => {
    const login = (app: TestApp['app'], forwardedFor: string) =>
      request(app.getHttpServer())
        .post('/auth/login')
        .set('X-Forwarded-For', forwardedFor)
        .send({ username: 'nobody', password: 'test-password' });

    it('keeps one rate-limit bucket per forwarded client when the proxy is trusted', async () => {
      const proxied = await createTestApp({
        configure: (config) => {
          config.http.trustProxy = true;
          config.rateLimit.maxRequests = 1;
        },
      });

      try {
        await login(proxied.app, '198.51.100.1').expect(400);
        await login(proxied.app, '198.51.100.2').expect(400);
        const limited = await login(proxied.app, '198.51.100.1').expect(429);
        expect(limited.body.detail).toBe('RATE_LIMIT_EXCEEDED');
      } finally {
        await proxied.app.close();
      }
    });

    it('ignores forwarded headers when the proxy is not trusted', async () => {
      const direct = await createTestApp({
        configure: (config) => {
          config.rateLimit.maxRequests = 1;
        },
      });

      try {
        await login(direct.app, '198.51.100.1').expect(400);
        await login(direct.app, '198.51.100.2').expect(429);
      } finally {
        await direct.app.close();
      }
    });
  });
});
