import { VisitEventType } from '../../../audit/audit.service';
import { localTime } from '../../../../test/utils/fixed-clock';
import {
  ADMIN_PRINCIPAL,
  HOST_PRINCIPAL,
  SECURITY_PRINCIPAL,
} from '../../../../test/utils/test-config';
import {
  VISIT_DETAILS,
  VisitTestContext,
  createVisitTestingModule,
} from '../../../../test/utils/visit-testing-module';
import { buildVisitRecord } from '../../../../test/utils/visit-record.factory';
import { HmacTokenSigner } from '../../infrastructure/signing/hmac-token-signer';
import {
  InvalidVisitDetailsError,
  PrincipalNotAuthorizedError,
  VisitIssuanceError,
} from '../errors/visit.errors';
import { buildSigningPayload } from '../utils/signing-payload.util';

const MINUTE = 60 * 1000;

describe('TokenIssuerDomainService', () => {
  let ctx: VisitTestContext;

  beforeEach(async () => {
    ctx = await createVisitTestingModule({ tokens: ['tok-1', 'tok-2'] });
  });

  it('issues a same-day visit for a host', async () => {
    const record = await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);

    expect(record).toEqual({
      token: 'tok-1',
      signature: null,
      visitorName: 'Ada Lovelace',
      hostName: 'Charles Babbage',
      location: 'Building B',
      purpose: 'Design review',
      requestedDurationMs: 30 * MINUTE,
      issuedAt: localTime(9, 0),
      dailyExpiry: localTime(23, 59, 59),
      identityVerified: false,
      identityArtifact: null,
      confirmedAt: null,
      issuedBy: HOST_PRINCIPAL,
      confirmedBy: null,
    });
    await expect(ctx.repository.findByToken('tok-1')).resolves.toEqual(record);
    expect(ctx.auditEvents).toHaveBeenCalledWith(
      expect.objectContaining({
        event: VisitEventType.VISIT_ISSUED,
        success: true,
        token: 'tok-1',
        principalId: HOST_PRINCIPAL,
      }),
    );
  });

  it('trims the visit details', async () => {
    const record = await ctx.issuer.issueToken(
      { ...VISIT_DETAILS, visitorName: '  Ada Lovelace  ', purpose: '\tDesign review\n' },
      HOST_PRINCIPAL,
    );

    expect(record.visitorName).toBe('Ada Lovelace');
    expect(record.purpose).toBe('Design review');
  });

  it('reads the stay length from free text', async () => {
    const twoHours = await ctx.issuer.issueToken(
      { ...VISIT_DETAILS, duration: '2 hours' },
      HOST_PRINCIPAL,
    );
    const soon = await ctx.issuer.issueToken(
      { ...VISIT_DETAILS, duration: 'soon' },
      HOST_PRINCIPAL,
    );

    expect(twoHours.requestedDurationMs).toBe(120 * MINUTE);
    expect(soon.requestedDurationMs).toBe(30 * MINUTE);
  });

  it('expires at the end of the issuing day', async () => {
    ctx.clock.set(localTime(23, 30));

    const record = await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);

    expect(record.dailyExpiry).toEqual(localTime(23, 59, 59));
  });

  it('rejects blank details', async () => {
    await expect(
      ctx.issuer.issueToken(
        { ...VISIT_DETAILS, location: '   ', purpose: '' },
        HOST_PRINCIPAL,
      ),
    ).rejects.toThrow(new InvalidVisitDetailsError(['location', 'purpose']));
    await expect(ctx.repository.findByToken('tok-1')).resolves.toBeNull();
  });

  it('only lets hosts issue', async () => {
    await expect(
      ctx.issuer.issueToken(VISIT_DETAILS, SECURITY_PRINCIPAL),
    ).rejects.toBeInstanceOf(PrincipalNotAuthorizedError);
    expect(ctx.auditEvents).toHaveBeenCalledWith(
      expect.objectContaining({
        event: VisitEventType.UNAUTHORIZED_PRINCIPAL,
        success: false,
        principalId: SECURITY_PRINCIPAL,
      }),
    );
  });

  it('lets admins issue', async () => {
    const record = await ctx.issuer.issueToken(VISIT_DETAILS, ADMIN_PRINCIPAL);
    expect(record.issuedBy).toBe(ADMIN_PRINCIPAL);
  });

  it('draws a new token on collision', async () => {
    await ctx.repository.create(
      buildVisitRecord({ token: 'tok-1', visitorName: 'Earlier Visitor' }),
    );

    const record = await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);

    expect(record.token).toBe('tok-2');
    await expect(ctx.repository.findByToken('tok-1')).resolves.toMatchObject({
      visitorName: 'Earlier Visitor',
    });
  });

  it('gives up after the configured number of collisions', async () => {
    ctx = await createVisitTestingModule({ tokens: ['dup', 'dup', 'dup'] });
    await ctx.repository.create(buildVisitRecord({ token: 'dup' }));

    await expect(
      ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL),
    ).rejects.toBeInstanceOf(VisitIssuanceError);
    expect(ctx.auditEvents).toHaveBeenCalledWith(
      expect.objectContaining({
        event: VisitEventType.VISIT_ISSUE_FAILED,
        success: false,
      }),
    );
  });

  it('signs the visit details when a signer is configured', async () => {
    const signer = new HmacTokenSigner('test-secret');
    ctx = await createVisitTestingModule({ signer, tokens: ['tok-1'] });

    const record = await ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL);

    expect(record.signature).toBe(signer.sign(buildSigningPayload(record)));
  });

  it('hands out distinct URL-safe tokens under concurrent issuance', async () => {
    ctx = await createVisitTestingModule();

    const records = await Promise.all(
      Array.from({ length: 25 }, () =>
        ctx.issuer.issueToken(VISIT_DETAILS, HOST_PRINCIPAL),
      ),
    );

    const tokens = new Set(records.map((record) => record.token));
    expect(tokens.size).toBe(25);
    for (const token of tokens) {
      expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    }
  });
});
