import { IncrementalReputationEngine } from '../incremental-reputation.engine';
import { ResourceTrustService } from '../../storage/resource-trust.service';
import { MetricsService } from '../../../metrics/metrics.service';
import { ReputationStrategy } from '../../../config/config.constants';
import { buildSession } from '../../../../test/helpers/sessions';

describe('IncrementalReputationEngine', () => {
  let trustService: ResourceTrustService;
  let engine: IncrementalReputationEngine;

  beforeEach(() => {
    trustService = new ResourceTrustService(new MetricsService());
    engine = new IncrementalReputationEngine(trustService);
  });

  it('should report the incremental strategy', () => {
    expect(engine.strategy).toBe(ReputationStrategy.INCREMENTAL);
  });

  describe('onConnect', () => {
    it('should reward IP and rDNS trust twice for resolved, forward-confirmed DNS', () => {
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });

      const overall = engine.onConnect(session);

      expect(session.trust.ip).toBeCloseTo(0.6, 10);
      expect(session.trust.rdns).toBeCloseTo(0.58, 10);
      // 0.6 * 0.5 + 0.58 * 0.3
      expect(overall).toBeCloseTo(0.474, 10);
      expect(session.trust.overall).toBe(overall);
    });

    it('should penalize twice when there is no rDNS and FCrDNS fails', () => {
      const session = buildSession({ rdns: false, fcrdns: false });

      const overall = engine.onConnect(session);

      expect(session.trust.ip).toBeCloseTo(0.3, 10);
      expect(session.trust.rdns).toBeCloseTo(0.34, 10);
      // 0.3 * 0.5 + 0.34 * 0.3
      expect(overall).toBeCloseTo(0.252, 10);
    });

    it('should start from the stored IP trust', () => {
      trustService.update('ip', '192.0.2.10', 0.9);
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });

      engine.onConnect(session);

      expect(session.trust.ip).toBeCloseTo(1, 10);
    });
  });

  describe('onIdentify', () => {
    it('should reward all three trusts when HELO matches the rDNS name', () => {
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });
      engine.onConnect(session);
      session.heloName = 'Mail.Example.Test.';

      const overall = engine.onIdentify(session);

      expect(session.trust.ip).toBeCloseTo(0.65, 10);
      expect(session.trust.rdns).toBeCloseTo(0.62, 10);
      expect(session.trust.helo).toBeCloseTo(0.53, 10);
      // 0.65 * 0.5 + 0.62 * 0.3 + 0.53 * 0.2
      expect(overall).toBeCloseTo(0.617, 10);
    });

    it('should penalize all three trusts when HELO differs from the rDNS name', () => {
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });
      engine.onConnect(session);
      session.heloName = 'localhost';

      const overall = engine.onIdentify(session);

      expect(session.trust.ip).toBeCloseTo(0.5, 10);
      expect(session.trust.rdns).toBeCloseTo(0.5, 10);
      expect(session.trust.helo).toBeCloseTo(0.44, 10);
      expect(overall).toBeCloseTo(0.488, 10);
    });

    it('should keep adjusting HELO trust when the client identifies again with the same name', () => {
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });
      engine.onConnect(session);
      session.heloName = 'mail.example.test';
      engine.onIdentify(session);
      session.heloName = 'MAIL.example.test.';

      const overall = engine.onIdentify(session);

      expect(session.trust.ip).toBeCloseTo(0.7, 10);
      expect(session.trust.rdns).toBeCloseTo(0.66, 10);
      expect(session.trust.helo).toBeCloseTo(0.56, 10);
      // 0.7 * 0.5 + 0.66 * 0.3 + 0.56 * 0.2
      expect(overall).toBeCloseTo(0.66, 10);
    });

    it('should load the stored HELO trust when the client identifies with a new name', () => {
      trustService.update('helo', 'other.example.test', 0.9);
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });
      engine.onConnect(session);
      session.heloName = 'mail.example.test';
      engine.onIdentify(session);
      session.heloName = 'other.example.test';

      engine.onIdentify(session);

      // stored 0.9, penalized for not matching the rDNS name
      expect(session.trust.helo).toBeCloseTo(0.84, 10);
      expect(session.trust.heloKey).toBe('other.example.test');
    });

    it('should only recompute the blend without rDNS', () => {
      const session = buildSession({ rdns: false, fcrdns: false });
      engine.onConnect(session);
      session.heloName = 'mx.example.test';

      const overall = engine.onIdentify(session);

      expect(session.trust.helo).toBe(0.5);
      // 0.3 * 0.5 + 0.34 * 0.3 + 0.5 * 0.2
      expect(overall).toBeCloseTo(0.352, 10);
    });
  });

  describe('envelope events', () => {
    it('should move overall trust with sender and recipient outcomes', () => {
      const session = buildSession();
      session.trust.overall = 0.5;

      engine.onMailFrom(session, true);
      expect(session.trust.overall).toBeCloseTo(0.52, 10);

      engine.onRecipient(session, 'ok');
      expect(session.trust.overall).toBeCloseTo(0.545, 10);

      engine.onRecipient(session, 'permfail');
      expect(session.trust.overall).toBeCloseTo(0.495, 10);

      engine.onRecipient(session, 'tempfail');
      expect(session.trust.overall).toBeCloseTo(0.445, 10);

      engine.onMailFrom(session, false);
      expect(session.trust.overall).toBeCloseTo(0.405, 10);
    });
  });

  describe('onDisconnect', () => {
    it('should fold the session into the shared tables', () => {
      const session = buildSession({ rdns: true, rdnsName: 'mail.example.test', fcrdns: true });
      engine.onConnect(session);
      session.heloName = 'MAIL.example.test';
      engine.onIdentify(session);
      engine.onMailFrom(session, true);
      engine.onRecipient(session, 'ok');
      engine.onRecipient(session, 'permfail');

      const overall = engine.onDisconnect(session);

      expect(overall).toBeCloseTo(0.612, 10);
      // (0.65 + 0.612 * 0.5) / 2
      expect(trustService.ipTrust('192.0.2.10')).toBeCloseTo(0.478, 10);
      // (0.62 + 0.612 * 0.3) / 2
      expect(trustService.rdnsTrust('mail.example.test')).toBeCloseTo(0.4018, 10);
      // (0.53 + 0.612 * 0.2) / 2
      expect(trustService.hostTrust('mail.example.test')).toBeCloseTo(0.3262, 10);
    });

    it('should only write the IP trust when no name was seen', () => {
      const session = buildSession({ rdns: false, fcrdns: false });
      engine.onConnect(session);

      engine.onDisconnect(session);

      expect(trustService.size('ip')).toBe(1);
      expect(trustService.size('rdns')).toBe(0);
      expect(trustService.size('helo')).toBe(0);
    });
  });
});
