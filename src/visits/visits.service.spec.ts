import { createTestConfigService, HOST_PRINCIPAL, SECURITY_PRINCIPAL } from '../../test/utils/test-config';
import { localTime } from '../../test/utils/fixed-clock';
import { pngArtifact } from '../../test/utils/fake-identity-detector';
import {
  VISIT_DETAILS,
  VisitTestContext,
  createVisitTestingModule,
} from '../../test/utils/visit-testing-module';
import { buildVisitRecord } from '../../test/utils/visit-record.factory';
import { VisitStage } from './domain/enums/visit-stage.enum';
import { IdentityRejectionReason } from './domain/utils/identity-verdict.util';
import { VisitsService } from './visits.service';

describe('VisitsService', () => {
  let ctx: VisitTestContext;
  let service: VisitsService;

  beforeEach(async () => {
    ctx = await createVisitTestingModule({ tokens: ['tok-1'] });
    service = new VisitsService(
      ctx.issuer,
      ctx.authenticator,
      ctx.identityGate,
      ctx.confirmation,
      createTestConfigService(),
    );
  });

  describe('buildRedemptionUrl', () => {
    it('points at the visit resource', () => {
      expect(service.buildRedemptionUrl(buildVisitRecord())).toBe(
        'https://visits.test/api/v1/visits/token-abc',
      );
    });

    it('carries the signature when the visit is signed', () => {
      expect(
        service.buildRedemptionUrl(
          buildVisitRecord({ token: 'a-b_c', signature: 'x+y/z' }),
        ),
      ).toBe('https://visits.test/api/v1/visits/a-b_c?signature=x%2By%2Fz');
    });
  });

  it('returns the token with the issued visit', async () => {
    const issued = await service.issueVisit(VISIT_DETAILS, HOST_PRINCIPAL);

    expect(issued).toEqual({
      token: 'tok-1',
      signature: null,
      redemptionUrl: 'https://visits.test/api/v1/visits/tok-1',
      visit: {
        visitorName: 'Ada Lovelace',
        hostName: 'Charles Babbage',
        location: 'Building B',
        purpose: 'Design review',
        requestedDuration: 'PT30M',
        issuedAt: localTime(9, 0),
        dailyExpiry: localTime(23, 59, 59),
        stage: VisitStage.IDENTITY_PENDING,
        identityVerified: false,
        confirmedAt: null,
        tokenExpired: false,
        stayExpired: false,
        remainingStayMs: null,
        remainingStay: null,
      },
    });
  });

  it('passes a rejection reason through', async () => {
    await service.issueVisit(VISIT_DETAILS, HOST_PRINCIPAL);
    ctx.detector.detections = [];

    const result = await service.submitIdentity('tok-1', pngArtifact());

    expect(result.status).toBe('rejected');
    expect(result.reason).toBe(IdentityRejectionReason.NO_IDENTITY_DOCUMENT);
  });

  it('shows the countdown after entry', async () => {
    await service.issueVisit(VISIT_DETAILS, HOST_PRINCIPAL);
    await service.submitIdentity('tok-1', pngArtifact());
    await service.confirmEntry('tok-1', SECURITY_PRINCIPAL);
    ctx.clock.advance(5 * 60 * 1000);

    await expect(service.getVisit('tok-1')).resolves.toMatchObject({
      stage: VisitStage.CONFIRMED,
      remainingStayMs: 25 * 60 * 1000,
      remainingStay: '25 minutes',
    });
  });
});
