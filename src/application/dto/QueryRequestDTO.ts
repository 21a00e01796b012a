import { z } from 'zod';

export const QueryRequestSchema = z
  .object({
    phone: z.string().catch(''),
    message: z.string().catch(''),
  })
  .catch({ phone: '', message: '' });

export type QueryRequestDTO = z.infer<typeof QueryRequestSchema>;
