import { z } from 'zod';

// Any printable ASCII punctuation character
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/;

export const usernameSchema = z
  .string()
  .min(3, 'Username must be at least 3 characters')
  .max(30, 'Username must be at most 30 characters')
  .regex(/^[a-zA-Z0-9_]+$/, 'Username may only contain letters, digits and underscores');

export const passwordSchema = z
  .string()
  .min(6, 'Password must be at least 6 characters long')
  .regex(PUNCTUATION, 'Password must contain at least one special character');

export const registerInputSchema = z.object({
  name: z.string().trim().min(1, 'Name cannot be empty').optional(),
  username: usernameSchema,
  password: passwordSchema,
});

export type RegisterInput = z.infer<typeof registerInputSchema>;

export const credentialsSchema = z.object({
  username: z.string().min(1, 'Username and password are required'),
  password: z.string().min(1, 'Username and password are required'),
});
