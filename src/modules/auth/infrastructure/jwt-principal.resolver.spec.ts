import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { JwtPrincipalResolver } from './jwt-principal.resolver';

describe('JwtPrincipalResolver', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });
  const resolver = new JwtPrincipalResolver(
    jwtService,
    new ConfigService({ auth: { staffRoles: ['admin', 'builder'] } }),
  );

  const bearer = async (claims: Record<string, unknown>, secret = 'test-secret') =>
    `Bearer ${await jwtService.signAsync(claims, { secret })}`;

  it('resolves a regular principal from the subject claim', async () => {
    await expect(resolver.resolve(await bearer({ sub: 'user-1' }))).resolves.toEqual({
      id: 'user-1',
      role: 'regular',
    });
  });

  it('maps configured staff roles case-insensitively, from a string or a list', async () => {
    await expect(
      resolver.resolve(await bearer({ sub: 'staff-1', role: 'Builder' })),
    ).resolves.toEqual({ id: 'staff-1', role: 'staff' });
    await expect(
      resolver.resolve(await bearer({ sub: 'staff-2', role: ['player', 'admin'] })),
    ).resolves.toEqual({ id: 'staff-2', role: 'staff' });
    await expect(
      resolver.resolve(await bearer({ sub: 'user-2', role: 'player' })),
    ).resolves.toEqual({ id: 'user-2', role: 'regular' });
  });

  it('treats missing, malformed and forged credentials as anonymous', async () => {
    await expect(resolver.resolve(undefined)).resolves.toBeNull();
    await expect(resolver.resolve('Basic dXNlcjpwYXNz')).resolves.toBeNull();
    await expect(resolver.resolve('Bearer not-a-jwt')).resolves.toBeNull();
    await expect(
      resolver.resolve(await bearer({ sub: 'user-1' }, 'other-secret')),
    ).resolves.toBeNull();
    await expect(resolver.resolve(await bearer({ role: 'admin' }))).resolves.toBeNull();
  });
});
