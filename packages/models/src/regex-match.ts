import { z } from "zod";

/**
 * A rename or emoji rule: `match` is a regex, `replace` its replacement,
 * `script` an optional script used instead of the regex pair
 */
export const RegexMatchConfigSchema = z.object({
  match: z.string(),
  replace: z.string().default(""),
  script: z.string().default(""),
});

export type RegexMatchConfig = z.infer<typeof RegexMatchConfigSchema>;
