import { z } from "zod";
import { advisoryMetaSchema } from "@src/util/advisory";

const nodeId = z.string().trim().min(1);

export const supplyEdgeSchema = z.object({
  supplier: nodeId,
  customer: nodeId,
  weight: z.number().finite().positive().default(1),
  relationship: z.string().optional(),
  country: z.string().optional(),
});

export const supplyOptionsSchema = z.object({
  betweennessWeight: z.number().finite().nonnegative(),
  geoWeight: z.number().finite().nonnegative(),
  weighted: z.boolean(),
  topK: z.number().int().positive().optional(),
  threshold: z.number().finite().optional(),
});

export const supplyInputSchema = z.object({
  edges: z.array(supplyEdgeSchema),
  nodes: z.array(nodeId).default([]),
  geoWeights: z.record(nodeId, z.number().min(0).max(1)).default({}),
  overrides: supplyOptionsSchema.partial().optional(),
  meta: advisoryMetaSchema.optional(),
});
