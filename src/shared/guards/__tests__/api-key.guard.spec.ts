import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ApiKeyGuard } from '../api-key.guard';
import { silenceNestLogger } from '../../../../test/helpers/silence-logger';

describe('ApiKeyGuard', () => {
  let guard: ApiKeyGuard;
  let restoreLogger: () => void;

  const configuredKey = 'test-api-key';

  const createMockContext = (headers: Record<string, string | string[] | undefined>) => {
    const mockRequest = { headers, path: '/api/metrics' };

    return {
      switchToHttp: jest.fn().mockReturnValue({
        getRequest: jest.fn().mockReturnValue(mockRequest),
      }),
    } as unknown as ExecutionContext;
  };

  const createGuard = async (apiKey: string | undefined) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApiKeyGuard,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => (key === 'reputation.server.apiKey' ? apiKey : undefined)),
          },
        },
      ],
    }).compile();

    return module.get<ApiKeyGuard>(ApiKeyGuard);
  };

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    guard = await createGuard(configuredKey);
  });

  afterEach(() => {
    restoreLogger();
  });

  it('should allow a request with the configured key', () => {
    expect(guard.canActivate(createMockContext({ 'x-api-key': configuredKey }))).toBe(true);
  });

  it('should use the first value of a repeated header', () => {
    expect(guard.canActivate(createMockContext({ 'x-api-key': [configuredKey, 'other'] }))).toBe(true);
  });

  it('should reject a request without the header', () => {
    const context = createMockContext({});

    expect(() => guard.canActivate(context)).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(context)).toThrow('Missing X-API-Key header');
  });

  it('should reject a wrong key', () => {
    expect(() => guard.canActivate(createMockContext({ 'x-api-key': 'wrong-key' }))).toThrow('Invalid API key');
  });

  it('should reject a key that only shares a prefix with the configured one', () => {
    expect(() => guard.canActivate(createMockContext({ 'x-api-key': `${configuredKey}-extra` }))).toThrow(
      'Invalid API key',
    );
  });

  it('should reject every request when no key is configured', async () => {
    const unconfigured = await createGuard(undefined);

    expect(() => unconfigured.canActivate(createMockContext({ 'x-api-key': configuredKey }))).toThrow(
      'API authentication not configured',
    );
  });
});
