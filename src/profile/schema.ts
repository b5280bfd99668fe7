import { z } from "zod";

/** Shape of the persisted profile document. Key order is the on-disk order. */
export const profileRecordSchema = z.object({
  name: z.string(),
  age: z.number().int().min(0).max(99),
  email: z.string(),
  phone: z.string(),
  occupation: z.string(),
  skills: z.array(z.string()),
  education: z.string(),
  location: z.string(),
  created_at: z.string().datetime({ offset: true }),
});

export type ProfileRecord = z.infer<typeof profileRecordSchema>;
