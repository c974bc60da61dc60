import { Inject, Injectable, Logger } from '@nestjs/common';

import { SingleFlight, withTimeout } from '../common';
import {
  SourceApiException,
  SourceNotConfiguredException,
  SourceNotFoundException,
  SourceTimeoutException,
} from './exceptions';
import {
  CurrencyListing,
  RateTable,
  SourceAdapter,
  SourceDescriptor,
} from './source-adapter.interface';
import { SourceName, isSourceName } from './source-name.enum';
import { SOURCE_ADAPTERS } from './sources.providers';
import { MetricsService } from '../metrics/metrics.service';

export type SourceHealth = 'online' | 'offline' | 'disabled';

export interface SourceStatus extends SourceDescriptor {
  status: SourceHealth;
  currencies?: number;
  error?: string;
}

/**
 * Owns the source adapters and the descriptor of each one.
 * Descriptors are frozen and the map holding them is replaced on every change,
 * so a caller that took a snapshot never sees a half-applied update.
 */
@Injectable()
export class SourcesManagerService {
  private readonly logger = new Logger(SourcesManagerService.name);
  private readonly adapters: ReadonlyMap<SourceName, SourceAdapter>;
  private descriptors: ReadonlyMap<SourceName, SourceDescriptor>;

  constructor(
    @Inject(SOURCE_ADAPTERS) adapters: SourceAdapter[],
    private readonly metricsService: MetricsService,
  ) {
    this.adapters = new Map(
      adapters.map((adapter): [SourceName, SourceAdapter] => [
        adapter.name,
        adapter,
      ]),
    );
    this.descriptors = new Map(
      adapters.map((adapter): [SourceName, SourceDescriptor] => {
        const { priority, enabled, timeoutMs } = adapter.getConfig();
        return [
          adapter.name,
          Object.freeze({ name: adapter.name, priority, enabled, timeoutMs }),
        ];
      }),
    );
  }

  getDescriptors(): SourceDescriptor[] {
    return this.sortByPriority([...this.descriptors.values()]);
  }

  /** Enabled sources in the order the fallback chain tries them */
  getActiveDescriptors(): SourceDescriptor[] {
    return this.getDescriptors().filter((descriptor) => descriptor.enabled);
  }

  getDescriptor(sourceName: SourceName | string): SourceDescriptor {
    const name = this.validateSourceName(sourceName);
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new SourceNotFoundException(sourceName, [...this.adapters.keys()]);
    }
    return descriptor;
  }

  setEnabled(sourceName: SourceName | string, enabled: boolean): SourceDescriptor {
    const current = this.getDescriptor(sourceName);
    if (current.enabled === enabled) {
      return current;
    }
    if (enabled && !this.getAdapter(current.name).isConfigured()) {
      throw new SourceNotConfiguredException(
        current.name,
        'required api key is missing from the configuration',
      );
    }

    const updated = Object.freeze({ ...current, enabled });
    const next = new Map(this.descriptors);
    next.set(updated.name, updated);
    this.descriptors = next;

    this.logger.log(`Source ${updated.name} ${enabled ? 'enabled' : 'disabled'}`);
    return updated;
  }

  @SingleFlight((sourceName: SourceName, base: string) => `${sourceName}-${base}`)
  async fetchRates(sourceName: SourceName, base: string): Promise<RateTable> {
    this.logger.debug(`Fetching ${sourceName} rates for ${base}`);
    const endTimer = this.metricsService.fetchLatency.startTimer({
      source: sourceName,
    });

    try {
      const adapter = this.getAdapter(sourceName);
      const rates = await adapter.fetchRates(base);
      this.metricsService.fetchThroughput.inc({
        source: sourceName,
        status: 'success',
      });
      return rates;
    } catch (error) {
      this.metricsService.fetchThroughput.inc({
        source: sourceName,
        status: 'error',
      });

      if (error instanceof SourceApiException && error.statusCode === 429) {
        this.metricsService.rateLimitHits.inc({ source: sourceName });
      }

      throw error;
    } finally {
      endTimer();
    }
  }

  @SingleFlight((sourceName: SourceName) => `${sourceName}-currencies`)
  async listCurrencies(sourceName: SourceName): Promise<CurrencyListing> {
    this.logger.debug(`Fetching currencies for ${sourceName}`);
    return this.getAdapter(sourceName).listCurrencies();
  }

  /** Probes every enabled source with its currency listing endpoint */
  async getStatus(): Promise<SourceStatus[]> {
    return Promise.all(
      this.getDescriptors().map(async (descriptor): Promise<SourceStatus> => {
        if (!descriptor.enabled) {
          return { ...descriptor, status: 'disabled' };
        }

        try {
          const currencies = await withTimeout(
            this.listCurrencies(descriptor.name),
            descriptor.timeoutMs,
            () => new SourceTimeoutException(descriptor.name, descriptor.timeoutMs),
          );
          return {
            ...descriptor,
            status: 'online',
            currencies: Object.keys(currencies).length,
          };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Source ${descriptor.name} is offline: ${message}`);
          return { ...descriptor, status: 'offline', error: message };
        }
      }),
    );
  }

  private getAdapter(sourceName: SourceName): SourceAdapter {
    const adapter = this.adapters.get(sourceName);
    if (!adapter) {
      throw new SourceNotFoundException(sourceName, [...this.adapters.keys()]);
    }
    return adapter;
  }

  private validateSourceName(sourceName: SourceName | string): SourceName {
    if (!isSourceName(sourceName)) {
      throw new SourceNotFoundException(sourceName, Object.values(SourceName));
    }
    return sourceName;
  }

  private sortByPriority(descriptors: SourceDescriptor[]): SourceDescriptor[] {
    return descriptors.sort(
      (a, b) => a.priority - b.priority || a.name.localeCompare(b.name),
    );
  }
}
