import {
  ArgumentsHost,
  BadRequestException,
  HttpException,
  HttpStatus,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { CannotExecuteNotConnectedError, QueryFailedError } from 'typeorm';
import {
  AllExceptionsFilter,
  isStoreUnavailable,
  reasonPhrase,
} from './all-exceptions.filter';

describe('AllExceptionsFilter', () => {
  let filter: AllExceptionsFilter;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    filter = new AllExceptionsFilter();
  });

  it('should keep the message of a NotFoundException', () => {
    expect(
      filter.toErrorResponse(new NotFoundException('Approval request 9 not found')),
    ).toEqual({
      statusCode: 404,
      message: 'Approval request 9 not found',
      error: 'Not Found',
    });
  });

  it('should keep validation messages as an array', () => {
    const exception = new BadRequestException(['limit must not be greater than 100']);

    expect(filter.toErrorResponse(exception)).toEqual({
      statusCode: 400,
      message: ['limit must not be greater than 100'],
      error: 'Bad Request',
    });
  });

  it('should derive the error name from a string response', () => {
    const exception = new HttpException('Slow down', HttpStatus.TOO_MANY_REQUESTS);

    expect(filter.toErrorResponse(exception)).toEqual({
      statusCode: 429,
      message: 'Slow down',
      error: 'Too Many Requests',
    });
  });

  it('should map a query that lost its connection to 503', () => {
    const exception = new QueryFailedError(
      'SELECT 1',
      [],
      Object.assign(new Error('terminating connection'), { code: '57P01' }),
    );

    expect(filter.toErrorResponse(exception)).toEqual({
      statusCode: 503,
      message: 'Database unavailable',
      error: 'Service Unavailable',
    });
  });

  it('should map a TypeORM "not connected" error to 503', () => {
    expect(
      filter.toErrorResponse(new CannotExecuteNotConnectedError('default'))
        .statusCode,
    ).toBe(503);
  });

  it('should map any other failed query to 500', () => {
    const exception = new QueryFailedError(
      'SELECT * FROM approval_requests WHERE id = $1',
      [3000000000],
      Object.assign(new Error('value "3000000000" is out of range for type integer'), {
        code: '22003',
      }),
    );

    expect(filter.toErrorResponse(exception)).toEqual({
      statusCode: 500,
      message: 'Internal server error',
      error: 'Internal Server Error',
    });
  });

  it('should hide the detail of an unexpected error', () => {
    expect(filter.toErrorResponse(new Error('boom'))).toEqual({
      statusCode: 500,
      message: 'Internal server error',
      error: 'Internal Server Error',
    });
  });

  it('should write the body with the matching status', () => {
    const send = jest.fn();
    const status = jest.fn().mockReturnValue({ send });
    const host = {
      switchToHttp: () => ({ getResponse: () => ({ status }) }),
    } as unknown as ArgumentsHost;

    filter.catch(new NotFoundException('gone'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(send).toHaveBeenCalledWith({
      statusCode: 404,
      message: 'gone',
      error: 'Not Found',
    });
  });
});

describe('isStoreUnavailable', () => {
  it('should recognise connection failures by code', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), {
      code: 'ECONNREFUSED',
    });
    const shuttingDown = Object.assign(new Error('terminating connection'), {
      code: '57P01',
    });

    expect(isStoreUnavailable(refused)).toBe(true);
    expect(isStoreUnavailable(shuttingDown)).toBe(true);
  });

  it('should ignore other errors', () => {
    const unique = Object.assign(new Error('duplicate key'), { code: '23505' });

    expect(isStoreUnavailable(unique)).toBe(false);
    expect(isStoreUnavailable('ECONNREFUSED')).toBe(false);
  });
});

describe('reasonPhrase', () => {
  it('should title-case the status name', () => {
    expect(reasonPhrase(404)).toBe('Not Found');
    expect(reasonPhrase(503)).toBe('Service Unavailable');
  });

  it('should fall back for unknown codes', () => {
    expect(reasonPhrase(599)).toBe('Error');
  });
});
