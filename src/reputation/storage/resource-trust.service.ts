/**
 * Resource Trust Service
 *
 * Cross-session trust per remote address, reverse-DNS name and HELO/EHLO
 * name, used by the incremental reputation model. Unseen keys read as the
 * neutral 0.5. Values change only through {@link ResourceTrustService.update},
 * written at session disconnect.
 *
 * Entries are never evicted, so the tables grow with every distinct address
 * and name seen. Unlike the session history there is no sweep here.
 */

import { Injectable } from '@nestjs/common';
import { MetricsService } from '../../metrics/metrics.service';
import { METRIC_PATHS } from '../../metrics/metrics.constants';
import type { MetricPath } from '../../metrics/metrics.constants';
import { NEUTRAL_TRUST } from '../../config/config.constants';
import { clampScore } from '../scoring/score.utils';
import type { BlendedResource } from '../adjuster/trust-adjuster';

const SIZE_METRICS: Record<BlendedResource, MetricPath> = {
  ip: METRIC_PATHS.TRUST_IP_ENTRIES,
  rdns: METRIC_PATHS.TRUST_RDNS_ENTRIES,
  helo: METRIC_PATHS.TRUST_HOST_ENTRIES,
};

@Injectable()
export class ResourceTrustService {
  private readonly tables: Record<BlendedResource, Map<string, number>> = {
    ip: new Map(),
    rdns: new Map(),
    helo: new Map(),
  };

  constructor(private readonly metricsService: MetricsService) {}

  ipTrust(address: string): number {
    return this.lookup('ip', address);
  }

  rdnsTrust(name: string): number {
    return this.lookup('rdns', name);
  }

  hostTrust(name: string): number {
    return this.lookup('helo', name);
  }

  lookup(resource: BlendedResource, key: string): number {
    return this.tables[resource].get(key) ?? NEUTRAL_TRUST;
  }

  update(resource: BlendedResource, key: string, value: number): void {
    const table = this.tables[resource];
    table.set(key, clampScore(value));
    this.metricsService.set(SIZE_METRICS[resource], table.size);
  }

  /**
   * Whether a value has ever been written for the key.
   */
  has(resource: BlendedResource, key: string): boolean {
    return this.tables[resource].has(key);
  }

  size(resource: BlendedResource): number {
    return this.tables[resource].size;
  }
}
