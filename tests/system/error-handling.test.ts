import {
  BaseErrorHandler,
  DatabaseErrorHandler,
  ErrorContext,
  FallbackErrorHandler
} from '../../src/system/error-handling';
import { AppError, AppErrorType } from '../../src/utils/error-handler';
import { silentLogger } from '../helpers/fakes';

describe('Error Handling', () => {
  const context: ErrorContext = {
    operation: 'testOperation',
    module: 'testModule'
  };

  describe('BaseErrorHandler', () => {
    class TestErrorHandler extends BaseErrorHandler<string> {
      readonly delays: number[] = [];

      protected async degrade(): Promise<string> {
        return 'degraded';
      }

      protected async wait(ms: number): Promise<void> {
        this.delays.push(ms);
      }
    }

    let handler: TestErrorHandler;

    beforeEach(() => {
      handler = new TestErrorHandler(context, silentLogger);
    });

    it('should retry until the operation succeeds', async () => {
      let attempt = 0;
      const operation = jest.fn(async () => {
        attempt++;
        if (attempt < 3) {
          throw new Error('Temporary failure');
        }
        return 'success';
      });

      const result = await handler.handle(operation, { maxRetries: 3, retryDelay: 10 });

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should degrade after the last attempt', async () => {
      const operation = jest.fn().mockRejectedValue(new Error('Permanent failure'));

      const result = await handler.handle(operation, { maxRetries: 2, retryDelay: 10 });

      expect(result).toBe('degraded');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should grow delays by the backoff factor', async () => {
      const operation = jest.fn().mockRejectedValue(new Error('Failure'));

      await handler.handle(operation, { maxRetries: 4, retryDelay: 100, backoffFactor: 2 });

      expect(handler.delays).toEqual([100, 200, 400]);
    });

    it('should make at least one attempt', async () => {
      const operation = jest.fn().mockResolvedValue('once');

      expect(await handler.handle(operation, { maxRetries: 0, retryDelay: 10 })).toBe('once');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('FallbackErrorHandler', () => {
    it('should return the fallback built from the last error', async () => {
      const handler = new FallbackErrorHandler<{ error: string }>(
        context,
        error => ({ error: error.message }),
        silentLogger
      );

      const result = await handler.handle(async () => {
        throw new Error('socket hang up');
      }, { maxRetries: 1, retryDelay: 0 });

      expect(result).toEqual({ error: 'socket hang up' });
    });
  });

  describe('DatabaseErrorHandler', () => {
    it('should throw a database error once retries are exhausted', async () => {
      const handler = new DatabaseErrorHandler<void>(context, silentLogger);

      const failure = handler.handle(async () => {
        throw new Error('DB failed');
      }, { maxRetries: 1, retryDelay: 0 });

      await expect(failure).rejects.toThrow('Database operation failed after retries: DB failed');
      await expect(failure).rejects.toBeInstanceOf(AppError);
    });
  });

  describe('AppError', () => {
    it('should map error types to HTTP statuses', () => {
      expect(AppError.validation('bad').statusCode).toBe(400);
      expect(AppError.authentication('no').statusCode).toBe(401);
      expect(AppError.notFound('gone').statusCode).toBe(404);
      expect(AppError.externalService('down').statusCode).toBe(502);
      expect(AppError.database('broken').statusCode).toBe(500);
    });

    it('should describe itself with type and operation', () => {
      const error = AppError.configuration('Missing key', 'loadConfig');

      expect(error.errorType).toBe(AppErrorType.CONFIGURATION_ERROR);
      expect(error.toString()).toBe('[configuration_error] Missing key (Operation: loadConfig)');
    });
  });
});
