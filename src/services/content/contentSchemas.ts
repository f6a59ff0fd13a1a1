import { z } from "zod";

import { StoredContent } from "@/types/content";

// Other writers may store null for an absent field; it reads as absent.
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const storedButtonSchema = z.object({
  label: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  action: z
    .object({
      type: z.string(),
      url: optionalString,
      data: optionalString,
      query: optionalString,
    })
    .nullish()
    .transform((value) => value ?? { type: "placeholder" }),
});

export const storedContentSchema = z.object({
  kind: z
    .string()
    .nullish()
    .transform((value) => value ?? "text"),
  text: optionalString,
  mediaRef: optionalString,
  buttons: z
    .array(z.array(storedButtonSchema))
    .nullish()
    .transform((value) => value ?? undefined),
});

/** Returns null for a missing column; throws a ZodError for a malformed one. */
export function parseStoredContent(value: unknown): StoredContent | null {
  if (value === null || value === undefined) {
    return null;
  }

  return storedContentSchema.parse(value);
}
