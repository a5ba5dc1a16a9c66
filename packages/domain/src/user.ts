export type UserRole = 'client' | 'studio_owner' | 'admin';

export type StudioStatus = 'pending' | 'verified' | 'rejected' | 'blocked';

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
  phone: string | null;
  role: UserRole;
  studioStatus: StudioStatus | null;
  emailVerified: boolean;
  emailVerifiedAt: Date | null;
  isBanned: boolean;
  bannedAt: Date | null;
  banReason: string | null;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** What leaves the core: no password hash, no lockout bookkeeping. */
export type PublicUser = Omit<User, 'passwordHash' | 'failedLoginAttempts' | 'lockedUntil'>;

export interface NewUser {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
  phone: string | null;
  role: UserRole;
  studioStatus: StudioStatus | null;
}

export type UserPatch = Partial<
  Pick<
    User,
    | 'passwordHash'
    | 'name'
    | 'phone'
    | 'emailVerified'
    | 'emailVerifiedAt'
    | 'failedLoginAttempts'
    | 'lockedUntil'
  >
>;

export interface RefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  familyId: string;
  rotatedFrom: string | null;
  issuedAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
  revokedAt: Date | null;
  reuseDetectedAt: Date | null;
  userAgent: string | null;
  ip: string | null;
}

export interface NewRefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  familyId: string;
  rotatedFrom: string | null;
  issuedAt: Date;
  expiresAt: Date;
  userAgent: string | null;
  ip: string | null;
}

export interface VerificationCode {
  id: string;
  userId: string;
  email: string;
  codeHash: string;
  attempts: number;
  expiresAt: Date;
  usedAt: Date | null;
  createdAt: Date;
}

export interface NewVerificationCode {
  id: string;
  userId: string;
  email: string;
  codeHash: string;
  expiresAt: Date;
  createdAt: Date;
}
