import { VisitEventType } from '../../../audit/audit.service';
import { pngArtifact } from '../../../../test/utils/fake-identity-detector';
import { localTime } from '../../../../test/utils/fixed-clock';
import { HOST_PRINCIPAL } from '../../../../test/utils/test-config';
import {
  VISIT_DETAILS,
  VisitTestContext,
  createVisitTestingModule,
} from '../../../../test/utils/visit-testing-module';
import {
  DetectorUnavailableError,
  InvalidIdentityArtifactError,
  VisitTokenExpiredError,
} from '../errors/visit.errors';
import { IdentityRejectionReason } from '../utils/identity-verdict.util';

describe('IdentityGateDomainService', () => {
  let ctx: VisitTestContext;

  beforeEach(async () => {
    ctx = await createVisitTestingModule({ tokens: ['tok-1'] });
    await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);
  });

  it('verifies identity when a document is detected confidently', async () => {
    const result = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact(),
    );

    expect(result.status).toBe('accepted');
    expect(result.visit).toMatchObject({
      identityVerified: true,
      identityArtifact: 'id-front.png',
    });
    await expect(ctx.repository.findByToken('tok-1')).resolves.toMatchObject({
      identityVerified: true,
      identityArtifact: 'id-front.png',
    });
    expect(ctx.auditEvents).toHaveBeenCalledWith(
      expect.objectContaining({
        event: VisitEventType.IDENTITY_ACCEPTED,
        success: true,
      }),
    );
  });

  it('rejects a low-confidence detection and allows a retry', async () => {
    ctx.detector.detections = [{ label: 'id_card', confidence: 0.5 }];

    const rejected = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact(),
    );

    expect(rejected).toEqual({
      status: 'rejected',
      reason: IdentityRejectionReason.LOW_CONFIDENCE,
      visit: expect.objectContaining({ identityVerified: false }),
    });
    await expect(ctx.repository.findByToken('tok-1')).resolves.toMatchObject({
      identityVerified: false,
      identityArtifact: null,
    });

    ctx.detector.detections = [{ label: 'passport', confidence: 0.88 }];
    const retried = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact('passport.jpg'),
    );

    expect(retried.status).toBe('accepted');
    expect(retried.visit.identityArtifact).toBe('passport.jpg');
  });

  it('rejects images without an identity document', async () => {
    ctx.detector.detections = [{ label: 'face', confidence: 0.99 }];

    const result = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact(),
    );

    expect(result).toMatchObject({
      status: 'rejected',
      reason: IdentityRejectionReason.NO_IDENTITY_DOCUMENT,
    });
  });

  it('keeps the first accepted artifact', async () => {
    await ctx.identityGate.submitIdentityArtifact('tok-1', pngArtifact());

    const again = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact('second.png'),
    );

    expect(again.status).toBe('accepted');
    expect(again.visit.identityArtifact).toBe('id-front.png');
    expect(ctx.detector.calls).toHaveLength(1);
  });

  it('reports the detector as unavailable and leaves the visit untouched', async () => {
    ctx.detector.failure = new DetectorUnavailableError('timeout');

    await expect(
      ctx.identityGate.submitIdentityArtifact('tok-1', pngArtifact()),
    ).rejects.toThrow(new DetectorUnavailableError('timeout'));
    await expect(ctx.repository.findByToken('tok-1')).resolves.toMatchObject({
      identityVerified: false,
    });
    expect(ctx.auditEvents).toHaveBeenCalledWith(
      expect.objectContaining({
        event: VisitEventType.DETECTOR_UNAVAILABLE,
        success: false,
      }),
    );
  });

  it('wraps unexpected detector failures', async () => {
    ctx.detector.failure = new Error('socket hang up');

    await expect(
      ctx.identityGate.submitIdentityArtifact('tok-1', pngArtifact()),
    ).rejects.toThrow('Identity detector unavailable: socket hang up');
  });

  it.each([
    ['an empty file', { ...pngArtifact(), content: Buffer.alloc(0) }],
    ['a PDF', { ...pngArtifact(), mimeType: 'application/pdf' }],
  ])('refuses %s without calling the detector', async (_case, artifact) => {
    await expect(
      ctx.identityGate.submitIdentityArtifact('tok-1', artifact),
    ).rejects.toBeInstanceOf(InvalidIdentityArtifactError);
    expect(ctx.detector.calls).toHaveLength(0);
  });

  it('refuses uploads over the configured size', async () => {
    ctx = await createVisitTestingModule({
      tokens: ['tok-1'],
      config: { identity: { maxArtifactBytes: 8 } },
    });
    await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);

    await expect(
      ctx.identityGate.submitIdentityArtifact('tok-1', pngArtifact()),
    ).rejects.toThrow('Identity artifact exceeds 8 bytes');
  });

  it('stores only the base name of the uploaded file', async () => {
    const result = await ctx.identityGate.submitIdentityArtifact(
      'tok-1',
      pngArtifact('C:\\fakepath\\my-id.png'),
    );

    expect(result.visit.identityArtifact).toBe('my-id.png');
  });

  it('refuses expired tokens before calling the detector', async () => {
    ctx.clock.set(localTime(23, 59, 59));
    ctx.clock.advance(1000);

    await expect(
      ctx.identityGate.submitIdentityArtifact('tok-1', pngArtifact()),
    ).rejects.toBeInstanceOf(VisitTokenExpiredError);
    expect(ctx.detector.calls).toHaveLength(0);
  });
});
