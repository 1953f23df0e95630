/**
 * Field schemas shared by registration and sign-up-with-subscription.
 */

import { z } from 'zod';

export const REQUIRED_FIELDS_MESSAGE = 'Email, password, and name are required';
export const MIN_PASSWORD_LENGTH = 6;

/** Deliberately loose: an "@" and a "." somewhere. */
export function isEmailFormat(email: string): boolean {
  return email.includes('@') && email.includes('.');
}

export const EmailSchema = z
  .string({ required_error: REQUIRED_FIELDS_MESSAGE })
  .trim()
  .min(1, REQUIRED_FIELDS_MESSAGE)
  .refine(isEmailFormat, 'Invalid email format');

export const NameSchema = z
  .string({ required_error: REQUIRED_FIELDS_MESSAGE })
  .trim()
  .min(1, REQUIRED_FIELDS_MESSAGE);

export const PasswordSchema = z
  .string({ required_error: REQUIRED_FIELDS_MESSAGE })
  .min(1, REQUIRED_FIELDS_MESSAGE)
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
