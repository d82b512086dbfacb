import { z } from 'zod';

/**
 * Response envelope of the vulnerability scan endpoint.
 */
export const ScanResponse = z.object({
  ok: z.boolean(),
  message: z.string().default(''),
  /** Assessment results; shape is owned by the backend */
  data: z.unknown().optional(),
});
export type ScanResponse = z.infer<typeof ScanResponse>;
