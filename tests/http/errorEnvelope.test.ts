import request from 'supertest';
import { createApp } from '../../src/app';
import {
  buildErrorEnvelope,
  parameterErrorEnvelope,
} from '../../src/http/errors/errorEnvelope';
import { t } from '../../src/validation/domain/TypeDescriptor';
import {
  MisconfiguredSourceError,
  MissingInputError,
  ParameterValidationFailure,
  TypeMismatchError,
} from '../../src/validation/errors/ParameterErrors';

describe('Error envelope + correlationId', () => {
  test('adds x-correlation-id to responses (generated)', async () => {
    const app = createApp();
    const res = await request(app).get('/health').expect(200);

    expect(res.headers['x-correlation-id']).toBeTruthy();
  });

  test('echoes x-correlation-id when provided', async () => {
    const app = createApp();
    const res = await request(app).get('/health').set('x-correlation-id', 'corr-xyz').expect(200);

    expect(res.headers['x-correlation-id']).toBe('corr-xyz');
  });

  test('404 uses standard error envelope', async () => {
    const app = createApp();
    const res = await request(app).get('/nope').expect(404);

    expect(res.body.error.code).toBe('NOT_FOUND');
    expect(res.body.error.correlationId).toBeTruthy();
  });

  test('omits empty optional fields', () => {
    expect(buildErrorEnvelope({ code: 'NOT_FOUND', message: 'Route not found' })).toEqual({
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
  });
});

describe('parameterErrorEnvelope', () => {
  test('describes a single request error', () => {
    const err = new MissingInputError('age', 'body');

    expect(parameterErrorEnvelope(err, 'corr-1')).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: "Required Body parameter 'age' not given",
        correlationId: 'corr-1',
        details: { parameter: 'age', kind: 'missing_input' },
      },
    });
  });

  test('flags misconfiguration separately from request errors', () => {
    const err = new MisconfiguredSourceError('token', 'header');

    expect(parameterErrorEnvelope(err).error.code).toBe('MISCONFIGURED_PARAMETER');
  });

  test('lists every issue of a collect-all failure', () => {
    const err = new ParameterValidationFailure([
      new MissingInputError('age', 'body'),
      new TypeMismatchError('id', t.int(), 'abc'),
    ]);

    expect(parameterErrorEnvelope(err)).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request parameters',
        issues: [
          "Required Body parameter 'age' not given",
          "Parameter 'id' must be type 'int', got 'str'",
        ],
        details: [
          { parameter: 'age', kind: 'missing_input' },
          { parameter: 'id', kind: 'type_mismatch' },
        ],
      },
    });
  });
});
