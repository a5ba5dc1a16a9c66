import { z } from 'zod';

const PHONE_REGEX = /^\+?[0-9 ()-]{7,20}$/;
const CODE_REGEX = /^\d{6}$/;

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .max(254, 'Email must be at most 254 characters')
  .email('Email must be a valid address');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password must be at most 128 characters');

export const NameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(100, 'Name must be at most 100 characters');

export const PhoneSchema = z
  .string()
  .trim()
  .regex(PHONE_REGEX, 'Phone may only contain digits, spaces, parentheses, hyphens and a leading +');

export const VerificationCodeSchema = z.string().trim().regex(CODE_REGEX, 'Code must be 6 digits');

export const RegisterRequestSchema = z.object({
  email: EmailSchema,
  password: PasswordSchema,
  name: NameSchema,
  phone: PhoneSchema.nullish(),
  role: z.enum(['client', 'studio_owner']).default('client'),
});

// Length rules apply at registration only; a login just has to fit the hasher.
export const LoginRequestSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, 'Password is required').max(128),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1).max(512),
});

export const LogoutRequestSchema = RefreshRequestSchema;

export const VerifyRequestSchema = z.object({
  email: EmailSchema,
});

export const VerifyConfirmRequestSchema = z.object({
  email: EmailSchema,
  code: VerificationCodeSchema,
});

export const AuthUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  phone: z.string().nullable(),
  role: z.enum(['client', 'studio_owner', 'admin']),
  studioStatus: z.enum(['pending', 'verified', 'rejected', 'blocked']).nullable(),
  emailVerified: z.boolean(),
  createdAt: z.string().datetime(),
});

export const RegisterResponseSchema = z.object({
  user: AuthUserSchema,
  verificationSentAt: z.string().datetime().nullable(),
});

export const RefreshResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal('Bearer'),
  expiresIn: z.number().int().positive(),
});

export const SessionResponseSchema = RefreshResponseSchema.extend({
  user: AuthUserSchema,
});

export const ErrorResponseSchema = z
  .object({
    code: z.string(),
    message: z.string(),
    reason: z.string().optional(),
  })
  .passthrough();

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type LogoutRequest = z.infer<typeof LogoutRequestSchema>;
export type VerifyRequest = z.infer<typeof VerifyRequestSchema>;
export type VerifyConfirmRequest = z.infer<typeof VerifyConfirmRequestSchema>;
export type AuthUser = z.infer<typeof AuthUserSchema>;
export type RegisterResponse = z.infer<typeof RegisterResponseSchema>;
export type RefreshResponse = z.infer<typeof RefreshResponseSchema>;
export type SessionResponse = z.infer<typeof SessionResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
