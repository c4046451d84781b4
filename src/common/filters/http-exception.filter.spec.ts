import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ThrottlerException } from '@nestjs/throttler';
import { HttpExceptionFilter } from './http-exception.filter';
import {
  InvalidInputException,
  SlotUnavailableException,
  UnauthorizedAccessException,
} from '../exceptions/domain.exceptions';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();
  let reply: { status: jest.Mock; send: jest.Mock };

  beforeEach(() => {
    reply = { status: jest.fn(), send: jest.fn() };
    reply.status.mockReturnValue(reply);
  });

  const handle = (exception: unknown) => {
    const request = { url: '/api/book-slots', method: 'POST', headers: {}, requestId: 'req-1' };
    filter.catch(exception, new ExecutionContextHost([request, reply]));
    return { status: reply.status.mock.calls[0][0], body: reply.send.mock.calls[0][0] };
  };

  it('should keep the domain code and details', () => {
    const { status, body } = handle(new SlotUnavailableException(['V1', 'V2']));

    expect(status).toBe(409);
    expect(body).toMatchObject({
      code: 'SLOT_UNAVAILABLE',
      message: 'Slots already booked: V1, V2',
      details: { slots: ['V1', 'V2'], reason: 'booked' },
      requestId: 'req-1',
      path: '/api/book-slots',
    });
  });

  it('should map unauthorised errors', () => {
    expect(handle(new UnauthorizedAccessException()).body).toMatchObject({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  });

  it('should map validation failures to 400', () => {
    const { status, body } = handle(new InvalidInputException('No slots provided'));

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'INVALID_INPUT', message: 'No slots provided' });
  });

  it('should map throttling to 429', () => {
    const { status, body } = handle(new ThrottlerException());

    expect(status).toBe(429);
    expect(body.code).toBe('RATE_LIMITED');
  });

  it('should hide unexpected errors behind a generic 500', () => {
    const { status, body } = handle(new Error('connection refused'));

    expect(status).toBe(500);
    expect(body).toMatchObject({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
});
