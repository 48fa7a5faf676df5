import { localTime } from '../../../../test/utils/fixed-clock';
import { buildVisitRecord } from '../../../../test/utils/visit-record.factory';
import { VisitRecord } from '../entities/visit-record.entity';
import { VisitStage } from '../enums/visit-stage.enum';
import { InvalidVisitTransitionError } from '../errors/visit.errors';
import { VisitStateMachine } from './visit-state-machine.util';

const MINUTE = 60 * 1000;

describe('VisitStateMachine', () => {
  describe('deriveStage', () => {
    it('starts in identity_pending when identity is required', () => {
      expect(VisitStateMachine.deriveStage(buildVisitRecord(), true)).toBe(
        VisitStage.IDENTITY_PENDING,
      );
    });

    it('skips identity_pending when the gate is disabled', () => {
      expect(VisitStateMachine.deriveStage(buildVisitRecord(), false)).toBe(
        VisitStage.AWAITING_CONFIRMATION,
      );
    });

    it('awaits confirmation once identity is verified', () => {
      const record = buildVisitRecord({
        identityVerified: true,
        identityArtifact: 'id.png',
      });
      expect(VisitStateMachine.deriveStage(record, true)).toBe(
        VisitStage.AWAITING_CONFIRMATION,
      );
    });

    it('is confirmed once confirmedAt is set', () => {
      const record = buildVisitRecord({
        identityVerified: true,
        confirmedAt: localTime(9, 10),
      });
      expect(VisitStateMachine.deriveStage(record, true)).toBe(
        VisitStage.CONFIRMED,
      );
    });
  });

  describe('stay countdown', () => {
    const confirmed = buildVisitRecord({
      identityVerified: true,
      confirmedAt: localTime(9, 10),
      requestedDurationMs: 30 * MINUTE,
    });

    it('has no countdown before confirmation', () => {
      const record = buildVisitRecord();
      expect(VisitStateMachine.remainingStayMs(record, localTime(10, 0))).toBeNull();
      expect(VisitStateMachine.isStayExpired(record, localTime(10, 0))).toBe(
        false,
      );
    });

    it('counts down from confirmation', () => {
      expect(
        VisitStateMachine.remainingStayMs(confirmed, localTime(9, 25)),
      ).toBe(15 * MINUTE);
    });

    it('reaches zero at the end of the stay without expiring yet', () => {
      expect(
        VisitStateMachine.remainingStayMs(confirmed, localTime(9, 40)),
      ).toBe(0);
      expect(VisitStateMachine.isStayExpired(confirmed, localTime(9, 40))).toBe(
        false,
      );
    });

    it('clamps at zero and flags the overstay afterwards', () => {
      expect(
        VisitStateMachine.remainingStayMs(confirmed, localTime(10, 15)),
      ).toBe(0);
      expect(VisitStateMachine.isStayExpired(confirmed, localTime(10, 15))).toBe(
        true,
      );
    });

    it('keeps stay expiry independent of token expiry', () => {
      const status = VisitStateMachine.describe(
        confirmed,
        localTime(10, 15),
        true,
      );
      expect(status).toEqual({
        stage: VisitStage.CONFIRMED,
        tokenExpired: false,
        stayExpired: true,
        remainingStayMs: 0,
      });
    });
  });

  describe('isTokenExpired', () => {
    it('expires strictly after dailyExpiry', () => {
      const record = buildVisitRecord();
      expect(
        VisitStateMachine.isTokenExpired(record, localTime(23, 59, 59)),
      ).toBe(false);
      expect(
        VisitStateMachine.isTokenExpired(
          record,
          new Date(localTime(23, 59, 59).getTime() + 1000),
        ),
      ).toBe(true);
    });
  });

  describe('assertMonotonicTransition', () => {
    const before = buildVisitRecord();

    it('allows verifying identity and confirming entry', () => {
      const verified = {
        ...before,
        identityVerified: true,
        identityArtifact: 'id.png',
      };
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(before, verified),
      ).not.toThrow();
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(verified, {
          ...verified,
          confirmedAt: localTime(9, 10),
          confirmedBy: 'guard-1',
        }),
      ).not.toThrow();
    });

    const changes: [string, Partial<VisitRecord>][] = [
      ['visitorName', { visitorName: 'Someone Else' }],
      ['requestedDurationMs', { requestedDurationMs: 2 * 60 * MINUTE }],
      ['signature', { signature: 'forged' }],
      [
        'dailyExpiry',
        { dailyExpiry: new Date(localTime(23, 59, 59).getTime() + 1000) },
      ],
    ];

    it.each(changes)('rejects a change to %s', (field, change) => {
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(before, {
          ...before,
          ...change,
        }),
      ).toThrow(new InvalidVisitTransitionError(field));
    });

    it('never clears identityVerified', () => {
      const verified = {
        ...before,
        identityVerified: true,
        identityArtifact: 'id.png',
      };
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(verified, before),
      ).toThrow(InvalidVisitTransitionError);
    });

    it('never moves or clears confirmedAt', () => {
      const confirmed = {
        ...before,
        identityVerified: true,
        confirmedAt: localTime(9, 10),
        confirmedBy: 'guard-1',
      };
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(confirmed, {
          ...confirmed,
          confirmedAt: localTime(9, 30),
        }),
      ).toThrow(new InvalidVisitTransitionError('confirmedAt'));
      expect(() =>
        VisitStateMachine.assertMonotonicTransition(confirmed, {
          ...confirmed,
          confirmedAt: null,
        }),
      ).toThrow(new InvalidVisitTransitionError('confirmedAt'));
    });
  });
});
