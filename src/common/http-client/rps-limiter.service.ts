import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

export interface RpsLimiterOptions {
  /** Requests per second; `null` leaves only the concurrency cap */
  rps: number | null;
  maxConcurrent: number;
}

/**
 * One Bottleneck per rate source. Jobs are never retried here: a failing
 * source hands over to the next one in the fallback chain instead.
 */
@Injectable()
export class RpsLimiterService implements OnModuleDestroy {
  private readonly logger = new Logger(RpsLimiterService.name);
  private readonly limiters = new Map<string, Bottleneck>();

  schedule<T>(
    sourceName: string,
    options: RpsLimiterOptions,
    job: () => Promise<T>,
  ): Promise<T> {
    return this.limiterFor(sourceName, options).schedule(job);
  }

  private limiterFor(sourceName: string, options: RpsLimiterOptions): Bottleneck {
    const existing = this.limiters.get(sourceName);
    if (existing) {
      return existing;
    }

    const limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrent,
      ...(options.rps && options.rps > 0
        ? reservoirSettings(options.rps)
        : {}),
    });
    limiter.on('error', (error: unknown) => {
      this.logger.error({ err: error }, `Limiter failure for ${sourceName}`);
    });

    this.limiters.set(sourceName, limiter);
    this.logger.debug(
      `Limiting ${sourceName} to ${options.maxConcurrent} concurrent requests` +
        (options.rps ? ` at ${options.rps} rps` : ''),
    );
    return limiter;
  }

  async onModuleDestroy(): Promise<void> {
    const limiters = [...this.limiters.values()];
    this.limiters.clear();
    await Promise.all(limiters.map((limiter) => limiter.stop()));
  }
}

function reservoirSettings(rps: number): Bottleneck.ConstructorOptions {
  const reservoir = Math.max(1, Math.floor(rps));
  return {
    minTime: Math.ceil(1000 / rps),
    reservoir,
    reservoirRefreshAmount: reservoir,
    reservoirRefreshInterval: 1000,
  };
}
