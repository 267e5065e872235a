import { Test, TestingModule } from '@nestjs/testing';
import { TransientProviderError } from '../common/errors';
import { CircuitBreakerFactory } from '../common/resilience/circuit-breaker.factory';
import { RETRY_POLICY, RetryPolicy } from '../common/resilience/retry-policy';
import { SEARCH_PROVIDER } from './interfaces/search-provider.interface';
import { SearchService } from './search.service';

describe('SearchService', () => {
  let module: TestingModule;
  let service: SearchService;
  let mockProvider: { name: string; search: jest.Mock };

  beforeEach(async () => {
    mockProvider = { name: 'fake', search: jest.fn() };

    module = await Test.createTestingModule({
      providers: [
        SearchService,
        CircuitBreakerFactory,
        { provide: SEARCH_PROVIDER, useValue: mockProvider },
        {
          provide: RETRY_POLICY,
          useValue: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }),
        },
      ],
    }).compile();

    service = module.get<SearchService>(SearchService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should return provider hits', async () => {
    const hits = [{ title: 'Stripe', snippet: 'Payments', url: 'https://stripe.com' }];
    mockProvider.search.mockResolvedValue(hits);

    await expect(service.search('stripe')).resolves.toEqual({ hits, degraded: false });
    expect(mockProvider.search).toHaveBeenCalledWith('stripe');
  });

  it('should retry transient failures', async () => {
    mockProvider.search
      .mockRejectedValueOnce(new TransientProviderError('fake', 'HTTP 429', 429))
      .mockResolvedValue([]);

    await expect(service.search('stripe')).resolves.toEqual({ hits: [], degraded: false });
    expect(mockProvider.search).toHaveBeenCalledTimes(2);
  });

  it('should degrade to flagged empty results once retries are exhausted', async () => {
    mockProvider.search.mockRejectedValue(new TransientProviderError('fake', 'HTTP 503', 503));

    await expect(service.search('stripe')).resolves.toEqual({ hits: [], degraded: true });
    expect(mockProvider.search).toHaveBeenCalledTimes(3);
  });

  it('should degrade to flagged empty results on a permanent failure without retrying', async () => {
    mockProvider.search.mockRejectedValue(new Error('fake: HTTP 401'));

    await expect(service.search('stripe')).resolves.toEqual({ hits: [], degraded: true });
    expect(mockProvider.search).toHaveBeenCalledTimes(1);
  });
});
