import {
  ArgumentsHost,
  BadRequestException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { AllExceptionsFilter } from './all-exceptions.filter';
import { TooManyRequestsException } from '../exceptions/too-many-requests.exception';

describe('AllExceptionsFilter', () => {
  let filter: AllExceptionsFilter;
  let status: jest.Mock;
  let json: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new AllExceptionsFilter();
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });

    const http = {
      getResponse: () => ({ status }),
      getRequest: () => ({ method: 'POST', url: '/auth/verify-otp' }),
    };
    host = {
      switchToHttp: () => http,
    } as unknown as ArgumentsHost;
  });

  it('renders a string message as detail', () => {
    filter.catch(new BadRequestException('Invalid OTP'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      detail: 'Invalid OTP',
      path: '/auth/verify-otp',
      timestamp: expect.any(String),
    });
  });

  it('keeps validation messages as a list', () => {
    filter.catch(
      new BadRequestException(['mobileNo must be a string', 'otp should not be empty']),
      host,
    );

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        detail: ['mobileNo must be a string', 'otp should not be empty'],
      }),
    );
  });

  it('uses the 429 status of rate limit errors', () => {
    filter.catch(new TooManyRequestsException('RATE_LIMIT_EXCEEDED'), host);

    expect(status).toHaveBeenCalledWith(429);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 429, detail: 'RATE_LIMIT_EXCEEDED' }),
    );
  });

  it('passes through server error messages raised on purpose', () => {
    filter.catch(new InternalServerErrorException('Failed to send OTP: boom'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ detail: 'Failed to send OTP: boom' }),
    );
  });

  it('hides unexpected errors behind a generic 500', () => {
    filter.catch(new Error('connection reset'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, detail: 'Internal server error' }),
    );
  });

  it('reports not found errors', () => {
    filter.catch(new NotFoundException('Prediction not found'), host);

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 404, detail: 'Prediction not found' }),
    );
  });
});
