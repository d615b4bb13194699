import request from 'supertest';
import { Server } from '../server';
import { CoachService } from '../services/conversation/coachService';
import { InMemoryProfileStore, InMemorySessionStore } from '../services/store/memoryStores';
import { loadConfig } from '../utils/config';
import { StoreUnavailableError } from '../utils/errors';

function createTestApp(ratePerMinute = 60, nodeEnv = 'test') {
  const profiles = new InMemoryProfileStore();
  const coach = new CoachService({ profiles, sessions: new InMemorySessionStore() });
  const config = loadConfig({
    NODE_ENV: nodeEnv,
    STORE_DRIVER: 'memory',
    RATE_LIMIT_COACH_PER_MIN: String(ratePerMinute),
  });
  return { app: new Server(config, coach).app, profiles, coach };
}

describe('POST /api/backend/v1/coach/messages', () => {
  it('replies to a message', async () => {
    const { app } = createTestApp();
    const res = await request(app).post('/api/backend/v1/coach/messages').send({ userId: 'u1', text: 'start' });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      kind: 'onboarding-prompt',
      reply: "Let's set up your profile.\n[░░░░░░░░░░] 0/5\nWhat is your sex? (male/female)",
    });
  });

  it('hands the validated, trimmed body to the coach', async () => {
    const { app, coach } = createTestApp();
    const handle = jest.spyOn(coach, 'handleMessage');
    const res = await request(app).post('/api/backend/v1/coach/messages').send({ userId: ' u1 ', text: '  help ' });
    expect(res.status).toBe(200);
    expect(handle).toHaveBeenCalledWith('u1', 'help');
  });

  it('rejects a body without text', async () => {
    const { app } = createTestApp();
    const res = await request(app).post('/api/backend/v1/coach/messages').send({ userId: 'u1' });
    expect(res.status).toBe(422);
    expect(res.body.error).toBe('validation_failed');
    expect(res.body.details.fieldErrors.text).toEqual(['Required']);
  });

  it('rejects unknown body fields', async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post('/api/backend/v1/coach/messages')
      .send({ userId: 'u1', text: 'help', admin: true });
    expect(res.status).toBe(422);
  });

  it('returns 503 when the store is down', async () => {
    const { app, profiles } = createTestApp();
    jest.spyOn(profiles, 'get').mockRejectedValueOnce(new StoreUnavailableError('profile.get'));
    const res = await request(app).post('/api/backend/v1/coach/messages').send({ userId: 'u1', text: 'help' });
    expect(res.status).toBe(503);
    expect(res.body.reply).toBe("I couldn't reach your records just now. Please try again in a moment.");
  });

  it('limits messages per user and address', async () => {
    const { app } = createTestApp(2);
    const send = (userId: string) =>
      request(app).post('/api/backend/v1/coach/messages').send({ userId, text: 'help' });
    expect((await send('u1')).status).toBe(200);
    expect((await send('u1')).status).toBe(200);
    expect((await send('u1')).status).toBe(429);
    expect((await send('u2')).status).toBe(200);
  });
});

describe('server settings', () => {
  it('trusts the first proxy only in production', () => {
    expect(createTestApp(60, 'production').app.get('trust proxy')).toBe(1);
    expect(createTestApp(60, 'development').app.get('trust proxy')).toBe(false);
  });
});

describe('health', () => {
  it('reports ok with the package version', async () => {
    const { app } = createTestApp();
    const res = await request(app).get('/api/backend/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.version).toBe('1.0.0');
    expect(typeof res.body.uptimeSeconds).toBe('number');
  });

  it('serves /healthz', async () => {
    const { app } = createTestApp();
    const res = await request(app).get('/healthz');
    expect(res.body).toEqual({ ok: true });
  });
});
