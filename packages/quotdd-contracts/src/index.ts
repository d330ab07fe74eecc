import { z } from "zod";

export const UnsignedIntegerSchema = z
  .string()
  .regex(/^\d+$/, "must be a decimal integer")
  .transform((value) => Number(value))
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

export const PortSchema = UnsignedIntegerSchema.pipe(z.number().max(65_535));

export const QuoteSchema = z.string().regex(/^.+\. ~ .+$/, "must look like \"<text>. ~ <attribution>\"");

export const QuoteListSchema = z.array(QuoteSchema).min(1, "Quotes are empty");

export const ServiceStatusSchema = z.object({
  listening: z.boolean(),
  address: z.string().nullable(),
  port: z.number().int().min(0).max(65_535).nullable(),
  trackedAddresses: z.number().int().nonnegative(),
  served: z.number().int().nonnegative(),
  rejected: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  dropped: z.number().int().nonnegative(),
  decays: z.number().int().nonnegative(),
  threshold: z.number().int().positive(),
  decayAmount: z.number().int().positive(),
  decayIntervalMs: z.number().int().positive(),
});

export const HealthSchema = z.object({
  ok: z.literal(true),
  ts: z.number().int().nonnegative(),
});

export type Quote = z.infer<typeof QuoteSchema>;
export type QuoteList = z.infer<typeof QuoteListSchema>;
export type ServiceStatus = z.infer<typeof ServiceStatusSchema>;
export type Health = z.infer<typeof HealthSchema>;
