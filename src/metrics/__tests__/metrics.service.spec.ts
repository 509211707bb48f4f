import { MetricsService } from '../metrics.service';
import { METRIC_PATHS } from '../metrics.constants';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(() => {
    service = new MetricsService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should start every counter at zero', () => {
    const metrics = service.getMetrics();

    expect(metrics.sessions).toEqual({
      connected_total: 0,
      skipped_total: 0,
      active: 0,
      scored_total: 0,
      handler_errors_total: 0,
    });
    expect(metrics.transactions).toEqual({ begun_total: 0, committed_total: 0, rolled_back_total: 0 });
    expect(metrics.history).toEqual({ recorded_total: 0, trimmed_total: 0, expired_total: 0, tracked_addresses: 0 });
    expect(metrics.trust).toEqual({ ip_entries: 0, rdns_entries: 0, host_entries: 0 });
  });

  it('should increment by one or by the given amount', () => {
    service.increment(METRIC_PATHS.SESSIONS_CONNECTED_TOTAL);
    service.increment(METRIC_PATHS.SESSIONS_CONNECTED_TOTAL);
    service.increment(METRIC_PATHS.HISTORY_TRIMMED_TOTAL, 3);

    expect(service.getMetrics().sessions.connected_total).toBe(2);
    expect(service.getMetrics().history.trimmed_total).toBe(3);
  });

  it('should decrement gauges', () => {
    service.increment(METRIC_PATHS.SESSIONS_ACTIVE, 2);
    service.decrement(METRIC_PATHS.SESSIONS_ACTIVE);

    expect(service.getMetrics().sessions.active).toBe(1);
  });

  it('should overwrite gauges on set', () => {
    service.set(METRIC_PATHS.TRUST_IP_ENTRIES, 7);
    service.set(METRIC_PATHS.TRUST_IP_ENTRIES, 4);

    expect(service.getMetrics().trust.ip_entries).toBe(4);
  });

  it('should report uptime in whole seconds', () => {
    jest.useFakeTimers({ now: new Date('2026-03-01T00:00:00Z') });
    const timed = new MetricsService();

    jest.setSystemTime(new Date('2026-03-01T00:01:30.900Z'));

    expect(timed.getMetrics().server.uptime_seconds).toBe(90);
  });
});
