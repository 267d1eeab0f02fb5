import { JwtService } from '@nestjs/jwt';
import { testConfig } from '../testing/fakes';
import { JwtAccessTokenIssuer } from './jwt-access-token.issuer';

describe('JwtAccessTokenIssuer', () => {
  const jwt = new JwtService({});
  const issuer = new JwtAccessTokenIssuer(jwt, testConfig({ accessTokenTtlSeconds: 600 }));

  it('round-trips subject and roles with the configured lifetime', async () => {
    const token = await issuer.issue('42', ['ROLE_USER', 'ROLE_ADMIN']);

    const claims = await issuer.validate(token);

    expect(claims).toMatchObject({ sub: '42', roles: ['ROLE_USER', 'ROLE_ADMIN'] });
    expect(claims?.exp).toBeDefined();
    expect((claims?.exp ?? 0) - (claims?.iat ?? 0)).toBe(600);
    expect(issuer.ttlSeconds).toBe(600);
  });

  it('rejects a token signed with another secret', async () => {
    const foreign = await jwt.signAsync({ sub: '42', roles: [] }, { secret: 'other-secret' });

    await expect(issuer.validate(foreign)).resolves.toBeNull();
  });

  it('rejects garbage and tokens without a subject', async () => {
    const anonymous = await jwt.signAsync({ roles: ['ROLE_USER'] }, { secret: 'test-secret' });

    await expect(issuer.validate('not-a-jwt')).resolves.toBeNull();
    await expect(issuer.validate(anonymous)).resolves.toBeNull();
  });
});
