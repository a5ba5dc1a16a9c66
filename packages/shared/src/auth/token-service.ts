import { SignJWT, jwtVerify } from 'jose';
import { type AccessTokenClaims, type TokenService, type UserRole } from '@bookwell/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  /** Seconds. */
  accessTokenTtl: number;
  issuer?: string;
}

const ROLES: readonly UserRole[] = ['client', 'studio_owner', 'admin'];

function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtl: number;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtl = config.accessTokenTtl;
    this.issuer = config.issuer ?? 'bookwell';
  }

  async signAccessToken(userId: string, role: UserRole): Promise<string> {
    return new SignJWT({ sub: userId, role })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(`${this.accessTokenTtl}s`)
      .sign(this.activeKey.secret);
  }

  /** Tokens signed under a retired kid keep verifying while the key stays listed. */
  async verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    const { payload } = await jwtVerify(
      token,
      async (header) => {
        const key = header.kid ? this.keys.get(header.kid) : this.activeKey;
        if (!key) throw new Error(`Unknown JWT key '${header.kid ?? ''}'`);
        return key.secret;
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
      },
    );

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }
    const role = payload['role'];
    if (!isUserRole(role)) {
      throw new Error('JWT missing role claim');
    }

    return { userId: payload.sub, role };
  }
}
