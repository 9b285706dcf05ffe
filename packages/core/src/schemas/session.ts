import { z } from "zod";

/** Session names become file names, so they are kept to a safe charset. */
export const SessionNameSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._-]+$/)
  .refine((name) => name !== "." && name !== "..", {
    message: "Session name cannot be a relative path segment",
  });

export const SearchSessionSchema = z.object({
  name: SessionNameSchema,
  savedAtUTC: z.string().datetime(),
  results: z.array(z.string()),
  cursor: z.number().int().min(0),
});

export type SearchSession = z.infer<typeof SearchSessionSchema>;
