import { z } from 'zod';

// Fields of the wrong type read as empty strings, so they fail the "missing" checks.
const formText = z.string().catch('');

export const LoginRequestSchema = z
  .object({
    phone: formText,
    password: formText,
  })
  .catch({ phone: '', password: '' });

export type LoginRequestDTO = z.infer<typeof LoginRequestSchema>;

export const RegisterRequestSchema = z
  .object({
    name: formText,
    phone: formText,
    password: formText,
  })
  .passthrough()
  .catch({ name: '', phone: '', password: '' });

export type RegisterRequestDTO = z.infer<typeof RegisterRequestSchema>;
