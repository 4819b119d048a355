import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Actor } from '../common/actor';
import { UnauthenticatedError } from '../common/errors';
import { User } from '../database/entities';
import { isStoredRole, StoredRole } from '../policy/roles';

interface TokenClaims {
  sub: string;
  role: StoredRole;
}

function isTokenClaims(value: unknown): value is TokenClaims {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const claims: Record<string, unknown> = { ...value };
  return (
    typeof claims.sub === 'string' &&
    /^\d+$/.test(claims.sub) &&
    isStoredRole(claims.role)
  );
}

@Injectable()
export class TokenService {
  constructor(private readonly jwt: JwtService) {}

  /** Signs the user's id and current role; expiry comes from JWT_EXPIRES_IN. */
  async issue(user: User): Promise<string> {
    const claims: TokenClaims = { sub: String(user.id), role: user.role };
    return this.jwt.signAsync(claims);
  }

  async verify(token: string): Promise<Actor> {
    let payload: object;
    try {
      payload = await this.jwt.verifyAsync<object>(token);
    } catch {
      throw new UnauthenticatedError('Token is invalid or expired');
    }
    if (!isTokenClaims(payload)) {
      throw new UnauthenticatedError('Token is invalid or expired');
    }
    return { userId: Number(payload.sub), role: payload.role };
  }
}
