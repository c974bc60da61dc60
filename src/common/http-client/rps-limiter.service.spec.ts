import { RpsLimiterService } from './rps-limiter.service';
import { createDeferred } from '../../../test/helpers/sources';

const settle = () => new Promise((resolve) => setTimeout(resolve, 10));

describe('RpsLimiterService', () => {
  let limiter: RpsLimiterService;

  beforeEach(() => {
    limiter = new RpsLimiterService();
  });

  afterEach(async () => {
    await limiter.onModuleDestroy();
  });

  it('holds jobs beyond the concurrency cap of a source', async () => {
    const first = createDeferred<string>();
    const started: string[] = [];
    const options = { rps: null, maxConcurrent: 1 };

    const a = limiter.schedule('frankfurter', options, () => {
      started.push('a');
      return first.promise;
    });
    const b = limiter.schedule('frankfurter', options, async () => {
      started.push('b');
      return 'b';
    });

    await settle();
    expect(started).toEqual(['a']);

    first.resolve('a');
    await expect(Promise.all([a, b])).resolves.toEqual(['a', 'b']);
    expect(started).toEqual(['a', 'b']);
  });

  it('limits each source separately', async () => {
    const blocked = createDeferred<string>();
    const options = { rps: null, maxConcurrent: 1 };

    const stuck = limiter.schedule('frankfurter', options, () => blocked.promise);
    const other = limiter.schedule('exchangerate-api', options, async () => 'ok');

    await expect(other).resolves.toBe('ok');
    blocked.resolve('done');
    await expect(stuck).resolves.toBe('done');
  });

  it('runs a failing job once and passes the error on', async () => {
    const job = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(
      limiter.schedule('frankfurter', { rps: null, maxConcurrent: 2 }, job),
    ).rejects.toThrow('boom');
    expect(job).toHaveBeenCalledTimes(1);
  });
});
