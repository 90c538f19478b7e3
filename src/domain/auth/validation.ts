import { z, ZodError } from 'zod';
import { ValidationError } from './errors.js';

export const DEFAULT_PASSWORD_MIN_LENGTH = 8;

const emailSchema = z
  .string()
  .trim()
  .min(1, 'Email is required')
  .email('Invalid email address');

export const loginInputSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required'),
});

/**
 * Registration rules. The password floor is configurable per deployment.
 */
export function registerInputSchema(passwordMinLength = DEFAULT_PASSWORD_MIN_LENGTH) {
  return z.object({
    name: z.string().trim().min(1, 'Name is required'),
    email: emailSchema,
    password: z
      .string()
      .min(passwordMinLength, `Password must be at least ${passwordMinLength} characters`),
  });
}

export type LoginInput = z.infer<typeof loginInputSchema>;
export type RegisterInput = z.infer<ReturnType<typeof registerInputSchema>>;

function toValidationError(error: ZodError): ValidationError {
  const issues = error.errors.map((e) => e.message);
  return new ValidationError(issues[0] ?? 'Invalid input', issues);
}

/**
 * Validate login input. Returns the normalized input or throws ValidationError.
 */
export function validateLogin(input: { email: string; password: string }): LoginInput {
  const result = loginInputSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate registration input. Returns the normalized input or throws ValidationError.
 */
export function validateRegister(
  input: { name: string; email: string; password: string },
  passwordMinLength = DEFAULT_PASSWORD_MIN_LENGTH
): RegisterInput {
  const result = registerInputSchema(passwordMinLength).safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
