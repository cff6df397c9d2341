// tests/http/accounts.endpoint.test.ts

import request from 'supertest';

import { createApp } from '../../src/app';
import { AccountService } from '../../src/accounts/application/AccountService';
import { InMemoryAccountStore } from '../../src/accounts/infrastructure/InMemoryAccountStore';

const FIXED_NOW = '2026-01-15T10:00:00.000Z';

function makeApp(overrides: Parameters<typeof createApp>[0] = {}) {
  const accountService = new AccountService(new InMemoryAccountStore(), {
    now: () => new Date(FIXED_NOW),
  });
  return createApp({ accountService, validationPolicy: 'fail-fast', ...overrides });
}

const validUpdate = {
  username: 'alice_w',
  age: 30,
  nicknames: ['al', 'ally'],
  passwordExpiry: 30.5,
};

describe('POST /v1/accounts/:id', () => {
  test('200 stores the coerced parameters', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42?isAdmin=true')
      .send(validUpdate)
      .expect(200);

    expect(res.body).toEqual({
      id: 42,
      username: 'alice_w',
      age: 30,
      nicknames: ['al', 'ally'],
      passwordExpiry: 30.5,
      isAdmin: true,
      updatedAt: FIXED_NOW,
    });
  });

  test('isAdmin defaults to false when the query omits it', async () => {
    const res = await request(makeApp()).post('/v1/accounts/42').send(validUpdate).expect(200);

    expect(res.body.isAdmin).toBe(false);
  });

  test('400 envelope names the violated bound', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42')
      .set('x-correlation-id', 'corr-1')
      .send({ ...validUpdate, age: 15 })
      .expect(400);

    expect(res.body).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: "Parameter 'age' must be at least 18",
        correlationId: 'corr-1',
        details: { parameter: 'age', kind: 'semantic_validation' },
      },
    });
  });

  test('400 for a blacklisted username character', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42')
      .send({ ...validUpdate, username: 'a<b>c' })
      .expect(400);

    expect(res.body.error.message).toBe("Parameter 'username' must not contain '<'");
  });

  test('400 for a non-numeric route id', async () => {
    const res = await request(makeApp()).post('/v1/accounts/abc').send(validUpdate).expect(400);

    expect(res.body.error.message).toBe("Parameter 'id' must be type 'int', got 'str'");
  });

  test('400 for a missing list parameter', async () => {
    const { nicknames: _omitted, ...withoutNicknames } = validUpdate;

    const res = await request(makeApp())
      .post('/v1/accounts/42')
      .send(withoutNicknames)
      .expect(400);

    expect(res.body.error.message).toBe("Required Body parameter 'nicknames' not given");
    expect(res.body.error.details).toEqual({ parameter: 'nicknames', kind: 'missing_input' });
  });

  test('400 names the declared union on a type mismatch', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42')
      .send({ ...validUpdate, passwordExpiry: 'soon' })
      .expect(400);

    expect(res.body.error.message).toBe(
      "Parameter 'passwordExpiry' must be type 'Union[int, float]', got 'str'",
    );
  });

  test('collect-all lists every failing parameter', async () => {
    const res = await request(makeApp({ validationPolicy: 'collect-all' }))
      .post('/v1/accounts/42')
      .send({ nicknames: [], passwordExpiry: 1 })
      .expect(400);

    expect(res.body.error.message).toBe('Invalid request parameters');
    expect(res.body.error.issues).toEqual([
      "Required Body parameter 'username' not given",
      "Required Body parameter 'age' not given",
    ]);
  });

  test('400 for a malformed JSON body', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42')
      .set('Content-Type', 'application/json')
      .send('{"username": ')
      .expect(400);

    expect(res.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Request body is not valid JSON.',
      correlationId: res.headers['x-correlation-id'],
    });
  });
});

describe('GET /v1/accounts/:id', () => {
  test('returns a stored account', async () => {
    const app = makeApp();
    await request(app).post('/v1/accounts/7').send(validUpdate).expect(200);

    const res = await request(app).get('/v1/accounts/7').expect(200);

    expect(res.body.id).toBe(7);
    expect(res.body.username).toBe('alice_w');
  });

  test('404 for an unknown account', async () => {
    const res = await request(makeApp()).get('/v1/accounts/7').expect(404);

    expect(res.body.error.code).toBe('NOT_FOUND');
    expect(res.body.error.message).toBe('Account 7 not found');
  });

  test('400 for an id below 1', async () => {
    const res = await request(makeApp()).get('/v1/accounts/0').expect(400);

    expect(res.body.error.message).toBe("Parameter 'id' must be at least 1");
  });
});

describe('POST /v1/accounts/:id/avatar', () => {
  const png = Buffer.from('fake-png-bytes');

  test('201 returns the stored upload metadata', async () => {
    const app = makeApp();
    await request(app).post('/v1/accounts/42').send(validUpdate).expect(200);

    const res = await request(app)
      .post('/v1/accounts/42/avatar')
      .field('caption', 'Beach day')
      .attach('avatar', png, { filename: 'me.png', contentType: 'image/png' })
      .expect(201);

    expect(res.body).toEqual({
      filename: 'me.png',
      contentType: 'image/png',
      sizeBytes: 14,
      caption: 'Beach day',
      uploadedAt: FIXED_NOW,
    });

    const account = await request(app).get('/v1/accounts/42').expect(200);
    expect(account.body.avatar.filename).toBe('me.png');
  });

  test('caption is optional', async () => {
    const app = makeApp();
    await request(app).post('/v1/accounts/42').send(validUpdate).expect(200);

    const res = await request(app)
      .post('/v1/accounts/42/avatar')
      .attach('avatar', png, { filename: 'me.png', contentType: 'image/png' })
      .expect(201);

    expect(res.body).not.toHaveProperty('caption');
  });

  test('400 for a disallowed content type', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42/avatar')
      .attach('avatar', png, { filename: 'notes.txt', contentType: 'text/plain' })
      .expect(400);

    expect(res.body.error.message).toBe(
      "Parameter 'avatar' must have content type image/png or image/jpeg or image/webp",
    );
  });

  test('400 when no file is uploaded', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/42/avatar')
      .field('caption', 'Beach day')
      .expect(400);

    expect(res.body.error.message).toBe("Required File parameter 'avatar' not given");
  });

  test('400 upload error when the file exceeds the upload limit', async () => {
    const res = await request(makeApp({ maxUploadBytes: 10 }))
      .post('/v1/accounts/42/avatar')
      .attach('avatar', png, { filename: 'me.png', contentType: 'image/png' })
      .expect(400);

    expect(res.body.error.code).toBe('UPLOAD_ERROR');
  });

  test('404 when the account does not exist', async () => {
    const res = await request(makeApp())
      .post('/v1/accounts/99/avatar')
      .attach('avatar', png, { filename: 'me.png', contentType: 'image/png' })
      .expect(404);

    expect(res.body.error.message).toBe('Account 99 not found');
  });
});
