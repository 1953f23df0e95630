/**
 * Registration, login and profile updates.
 */

import { z } from 'zod';
import { BadRequestError, UnauthorizedError } from '../common/errors.js';
import { hashPassword, verifyPassword } from '../common/passwords.js';
import { issueToken, type TokenSettings } from '../common/tokens.js';
import { toPublicUser, type PublicUser } from '../common/types/User.js';
import type { User } from '../common/types/index.js';
import {
  EmailSchema,
  MIN_PASSWORD_LENGTH,
  NameSchema,
  PasswordSchema,
  isEmailFormat,
} from '../common/validation.js';
import { AccountStore, DuplicateEmailError } from '../db/account_store.js';
import { toSubscriptionView, type SubscriptionView } from './subscriptions.js';

/** Any `role` in the body is ignored: admins are created with scripts/create-admin.ts. */
export const RegisterSchema = z.object({
  email: EmailSchema,
  name: NameSchema,
  password: PasswordSchema,
});

/** `username` is accepted for clients that post OAuth2-style password forms as JSON. */
export const LoginSchema = z
  .object({
    username: z.string().optional(),
    email: z.string().optional(),
    password: z.string({ required_error: 'Password is required' }),
  })
  .transform((body) => ({ email: (body.username ?? body.email ?? '').trim(), password: body.password }))
  .refine((body) => body.email !== '', 'Email is required');

export const UpdateNameSchema = z.object({
  name: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required'),
});

export const UpdatePasswordSchema = z.object({
  current_password: z.string({ required_error: 'Current password is required' }),
  new_password: z
    .string({ required_error: 'New password is required' })
    .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`),
});

export interface EmailCheckResult {
  exists: boolean;
  valid: boolean;
  message: string;
}

export interface LoginResult {
  access_token: string;
  token_type: 'bearer';
  user: PublicUser;
  subscription: SubscriptionView | null;
}

/**
 * @throws BadRequestError if no email is given
 */
export async function checkEmail(store: AccountStore, body: unknown): Promise<EmailCheckResult> {
  const parsed = z.object({ email: z.string().optional() }).safeParse(body);
  const email = parsed.success ? parsed.data.email?.trim() : undefined;
  if (!email) {
    throw new BadRequestError('Email is required');
  }
  if (!isEmailFormat(email)) {
    return { exists: false, valid: false, message: 'Invalid email format' };
  }
  const existing = await store.getUserByEmail(email);
  return {
    exists: existing !== null,
    valid: true,
    message: existing ? 'Email already registered' : 'Email available',
  };
}

export async function register(store: AccountStore, body: unknown): Promise<{ message: string; user_id: string }> {
  const input = RegisterSchema.parse(body);
  if (await store.getUserByEmail(input.email)) {
    throw new BadRequestError('Email already registered');
  }
  try {
    const user = await store.createUser({
      email: input.email,
      name: input.name,
      role: 'user',
      password_hash: await hashPassword(input.password),
    });
    return { message: 'Account created successfully! You can now log in.', user_id: user.id };
  } catch (error) {
    if (error instanceof DuplicateEmailError) {
      throw new BadRequestError('Email already registered');
    }
    throw error;
  }
}

/**
 * Exchange credentials for a bearer token. Expired or cancelled subscriptions do not block login.
 * @throws UnauthorizedError for an unknown email or wrong password (indistinguishable)
 */
export async function login(
  store: AccountStore,
  tokens: TokenSettings,
  body: unknown,
  now: Date = new Date()
): Promise<LoginResult> {
  const credentials = LoginSchema.parse(body);
  const user = await store.getUserByEmail(credentials.email);
  if (!user || !(await verifyPassword(credentials.password, user.password_hash))) {
    throw new UnauthorizedError('Incorrect email or password');
  }
  const latest = await store.getLatestSubscription(user.id);
  return {
    access_token: issueToken(tokens, user.email),
    token_type: 'bearer',
    user: toPublicUser(user),
    subscription: latest ? toSubscriptionView(latest, now) : null,
  };
}

export async function updateName(
  store: AccountStore,
  user: User,
  body: unknown
): Promise<{ message: string; name: string }> {
  const { name } = UpdateNameSchema.parse(body);
  const updated = await store.updateUser(user.id, { name });
  if (!updated) {
    throw new BadRequestError('Failed to update name');
  }
  return { message: 'Name updated successfully', name: updated.name };
}

/**
 * @throws BadRequestError if the current password does not match
 */
export async function updatePassword(store: AccountStore, user: User, body: unknown): Promise<{ message: string }> {
  const input = UpdatePasswordSchema.parse(body);
  if (!(await verifyPassword(input.current_password, user.password_hash))) {
    throw new BadRequestError('Current password is incorrect');
  }
  const updated = await store.updateUser(user.id, { password_hash: await hashPassword(input.new_password) });
  if (!updated) {
    throw new BadRequestError('Failed to update password');
  }
  return { message: 'Password updated successfully' };
}
