import { NextFunction, Request, Response } from 'express';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { apiKeyAuth, parseApiKeys } from '../../src/middleware/auth';
import { errorHandler } from '../../src/middleware/errorHandler';
import { NotFoundError, ServiceError, ValidationError } from '../../src/utils/errors';

function makeRes() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

function makeReq(path: string, apiKey?: string): Request {
  return { path, method: 'GET', header: (name: string) => (name === 'x-api-key' ? apiKey : undefined) } as unknown as Request;
}

describe('errorHandler', () => {
  const next: NextFunction = jest.fn();

  function handle(err: Error) {
    const res = makeRes();
    errorHandler(err, makeReq('/api/admin/memory/user-1'), res as unknown as Response, next);
    return res;
  }

  it('should return the status of an application error', () => {
    const res = handle(new ValidationError('message is required'));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'message is required' });
  });

  it('should return 404 for a missing conversation', () => {
    expect(handle(new NotFoundError('No conversation found for user-1')).status).toHaveBeenCalledWith(404);
  });

  it('should hide dependency failures behind a 503', () => {
    const res = handle(new ServiceError('MemoryStore', 'load', new Error('connection refused'), true));

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Service temporarily unavailable' });
  });

  it('should return 500 for anything else', () => {
    const res = handle(new Error('boom'));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'boom' });
  });
});

describe('apiKeyAuth', () => {
  const guard = apiKeyAuth('key-one, key-two');
  let next: jest.Mock;

  beforeEach(() => {
    next = jest.fn();
  });

  it('should parse a comma separated key list', () => {
    expect(parseApiKeys(' a, ,b ')).toEqual(new Set(['a', 'b']));
  });

  it('should let the health probe through', () => {
    guard(makeReq('/health'), makeRes() as unknown as Response, next);
    expect(next).toHaveBeenCalled();
  });

  it('should reject a request without a key', () => {
    const res = makeRes();
    guard(makeReq('/memory/user-1'), res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(401);
    expect(next).not.toHaveBeenCalled();
  });

  it('should reject an unknown key', () => {
    const res = makeRes();
    guard(makeReq('/memory/user-1', 'wrong'), res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(403);
  });

  it('should accept a configured key', () => {
    guard(makeReq('/memory/user-1', 'key-two'), makeRes() as unknown as Response, next);
    expect(next).toHaveBeenCalled();
  });
});
