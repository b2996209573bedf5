import { z } from "zod";

/**
 * Advisory metadata a data fetcher attaches to engine inputs. Engines never
 * inspect it; they copy it onto their results for the UI to display.
 */
export const advisoryMetaSchema = z.object({
  dataQuality: z.enum(["live", "synthetic"]).default("live"),
  warnings: z.array(z.string()).default([]),
});

export type AdvisoryMeta = z.output<typeof advisoryMetaSchema>;

export function echoMeta(meta?: AdvisoryMeta): AdvisoryMeta {
  return {
    dataQuality: meta?.dataQuality ?? "live",
    warnings: [...(meta?.warnings ?? [])],
  };
}
