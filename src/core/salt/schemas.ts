import { z } from "zod";

// `salt --out=json --static` prints one object keyed by minion id
export const SaltOutputSchema = z.record(z.string(), z.unknown());

// Full-return envelope: salt-ssh and --static full returns wrap the payload
export const EnvelopeSchema = z.object({
  retcode: z.number(),
  return: z.unknown().optional(),
  ret: z.unknown().optional(),
});

export const CompileErrorsSchema = z.array(z.string());

export const StateEntrySchema = z
  .object({
    result: z.boolean().nullable().optional(),
    comment: z.string().optional(),
  })
  .passthrough();

export const StateMapSchema = z.record(z.string(), StateEntrySchema);

export const UptimeSchema = z
  .object({
    seconds: z.number(),
  })
  .passthrough();

export type SaltOutput = z.infer<typeof SaltOutputSchema>;
