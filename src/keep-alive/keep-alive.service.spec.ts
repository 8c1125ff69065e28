import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Logger } from '@nestjs/common';
import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { KeepAliveService } from './keep-alive.service';

jest.mock('axios');

const mockedGet = jest.mocked(axios.get);

function response(status: number): AxiosResponse {
  return { status, statusText: '', data: '', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('KeepAliveService', () => {
  let schedulerRegistry: { addInterval: jest.Mock };
  let errorSpy: jest.SpyInstance;
  let registered: NodeJS.Timeout | undefined;

  async function createService(url: string | undefined): Promise<KeepAliveService> {
    const config: Record<string, unknown> = {
      'keepAlive.url': url,
      'keepAlive.intervalSeconds': 840,
      'keepAlive.retryAttempts': 3,
      'keepAlive.retryDelaySeconds': 0,
      'keepAlive.timeoutSeconds': 10,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KeepAliveService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => config[key]),
            getOrThrow: jest.fn((key: string) => config[key]),
          },
        },
        { provide: SchedulerRegistry, useValue: schedulerRegistry },
      ],
    }).compile();

    return module.get<KeepAliveService>(KeepAliveService);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    registered = undefined;
    schedulerRegistry = {
      addInterval: jest.fn((_name: string, interval: NodeJS.Timeout) => {
        registered = interval;
      }),
    };
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    if (registered) {
      clearInterval(registered);
    }
    jest.restoreAllMocks();
  });

  describe('onApplicationBootstrap', () => {
    it('does nothing without a URL', async () => {
      const service = await createService(undefined);

      service.onApplicationBootstrap();

      expect(schedulerRegistry.addInterval).not.toHaveBeenCalled();
      expect(mockedGet).not.toHaveBeenCalled();
    });

    it('registers the interval and pings immediately', async () => {
      mockedGet.mockResolvedValue(response(200));
      const service = await createService('https://jewelify.example.com/health');

      service.onApplicationBootstrap();

      expect(schedulerRegistry.addInterval).toHaveBeenCalledWith('keep-alive', expect.anything());
      expect(mockedGet).toHaveBeenCalledWith('https://jewelify.example.com/health', {
        timeout: 10000,
        validateStatus: expect.any(Function),
      });
    });
  });

  describe('ping', () => {
    it('succeeds on HTTP 200', async () => {
      mockedGet.mockResolvedValue(response(200));
      const service = await createService('https://jewelify.example.com/health');

      await expect(service.ping()).resolves.toBe(true);
      expect(mockedGet).toHaveBeenCalledTimes(1);
    });

    it('retries after a non-200 status', async () => {
      mockedGet.mockResolvedValueOnce(response(503)).mockResolvedValueOnce(response(200));
      const service = await createService('https://jewelify.example.com/health');

      await expect(service.ping()).resolves.toBe(true);
      expect(mockedGet).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured attempts', async () => {
      mockedGet.mockRejectedValue(new Error('timeout of 10000ms exceeded'));
      const service = await createService('https://jewelify.example.com/health');

      await expect(service.ping()).resolves.toBe(false);
      expect(mockedGet).toHaveBeenCalledTimes(3);
      expect(errorSpy).toHaveBeenCalledWith(
        'Keep-alive ping error: timeout of 10000ms exceeded (attempt 3/3)',
      );
      expect(errorSpy).toHaveBeenLastCalledWith(
        'Keep-alive ping failed after 3 attempts, next try in 840s',
      );
    });

    it('returns false without a URL', async () => {
      const service = await createService(undefined);

      await expect(service.ping()).resolves.toBe(false);
    });
  });
});
