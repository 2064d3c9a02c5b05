import { z } from 'zod';

export const devBypassLoginSchema = z.object({
  email: z.string().email(),
  name: z.string().min(1),
  role: z.enum(['user', 'admin']).default('user'),
});

export type DevBypassLoginInput = z.infer<typeof devBypassLoginSchema>;
