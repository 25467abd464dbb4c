/**
 * Error Hierarchy Unit Tests
 *
 * Covers the AppError subclasses, factory methods and the Hono error handler.
 */
import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  AppError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  ConflictError,
  RateLimitError,
  InternalError,
} from '../../src/lib/errors';
import { createHonoErrorHandler, createNotFoundHandler } from '../../src/lib/errors/error-handler';
import type { AppEnv } from '../../src/types';

describe('AppError base class', () => {
  it('should create error with all properties', () => {
    const error = new AppError('Test error', 'TEST_ERROR', 500, false);
    expect(error.message).toBe('Test error');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('TEST_ERROR');
    expect(error.isOperational).toBe(false);
    expect(error.name).toBe('AppError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to the client error body', () => {
    const error = new NotFoundError('Partner user not found.', 'PARTNER_NOT_FOUND');
    expect(error.toJSON()).toEqual({ message: 'Partner user not found.', code: 'PARTNER_NOT_FOUND' });
    expect(JSON.stringify(error)).toBe('{"message":"Partner user not found.","code":"PARTNER_NOT_FOUND"}');
  });
});

describe('Error subclasses', () => {
  const errorTypes = [
    { Class: ValidationError, status: 400, code: 'VALIDATION_ERROR', operational: true },
    { Class: AuthenticationError, status: 401, code: 'AUTHENTICATION_ERROR', operational: true },
    { Class: NotFoundError, status: 404, code: 'NOT_FOUND', operational: true },
    { Class: ConflictError, status: 409, code: 'CONFLICT', operational: true },
    { Class: RateLimitError, status: 429, code: 'RATE_LIMIT_EXCEEDED', operational: true },
    { Class: InternalError, status: 500, code: 'INTERNAL_ERROR', operational: false },
  ] as const;

  for (const { Class, status, code, operational } of errorTypes) {
    describe(Class.name, () => {
      it(`should have statusCode ${status} and code "${code}"`, () => {
        const error = new Class('test message');
        expect(error.statusCode).toBe(status);
        expect(error.code).toBe(code);
        expect(error.isOperational).toBe(operational);
      });

      it('should extend Error and AppError', () => {
        const error = new Class('test');
        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(AppError);
        expect(error.name).toBe(Class.name);
      });
    });
  }

  it('should accept a specific code', () => {
    const error = new AuthenticationError('Token has expired!', 'TOKEN_EXPIRED');
    expect(error.code).toBe('TOKEN_EXPIRED');
    expect(error.statusCode).toBe(401);
  });
});

describe('Factory methods', () => {
  it('AppError.validation() returns ValidationError', () => {
    const error = AppError.validation('Invalid input');
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(400);
  });

  it('AppError.unauthorized() returns AuthenticationError', () => {
    expect(AppError.unauthorized('nope')).toBeInstanceOf(AuthenticationError);
  });

  it('AppError.notFound() returns NotFoundError', () => {
    expect(AppError.notFound('gone').statusCode).toBe(404);
  });

  it('AppError.conflict() returns ConflictError', () => {
    expect(AppError.conflict('taken')).toBeInstanceOf(ConflictError);
  });

  it('AppError.rateLimited() has a default message', () => {
    expect(AppError.rateLimited().message).toBe('Rate limit exceeded');
  });

  it('AppError.internal() is not operational', () => {
    const error = AppError.internal();
    expect(error.message).toBe('Internal server error');
    expect(error.isOperational).toBe(false);
  });
});

describe('createHonoErrorHandler', () => {
  const app = new Hono<AppEnv>();
  app.get('/conflict', () => {
    throw new ConflictError('Username already exists.', 'USERNAME_TAKEN');
  });
  app.get('/internal', () => {
    throw AppError.internal('db exploded');
  });
  app.get('/http', () => {
    throw new HTTPException(418, { message: 'short and stout' });
  });
  app.get('/unknown', () => {
    throw new TypeError('undefined is not a function');
  });
  app.notFound(createNotFoundHandler());
  app.onError(createHonoErrorHandler());

  it('should map an AppError to its status and body', async () => {
    const res = await app.request('/conflict');
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ message: 'Username already exists.', code: 'USERNAME_TAKEN' });
  });

  it('should pass a 5xx AppError message through', async () => {
    const res = await app.request('/internal');
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ message: 'db exploded', code: 'INTERNAL_ERROR' });
  });

  it('should map an HTTPException', async () => {
    const res = await app.request('/http');
    expect(res.status).toBe(418);
    expect(await res.json()).toEqual({ message: 'short and stout', code: 'HTTP_ERROR' });
  });

  it('should hide unexpected errors', async () => {
    const res = await app.request('/unknown');
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ message: 'Internal Server Error', code: 'INTERNAL_SERVER_ERROR' });
  });

  it('should answer unknown routes with a JSON 404', async () => {
    const res = await app.request('/nowhere');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: 'Not Found', code: 'NOT_FOUND' });
  });
});
