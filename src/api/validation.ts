/**
 * API Validation Schemas
 * Zod schemas for webhook request validation
 */
import { z } from 'zod';

export const providerSpecificSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export const endpointSchema = z.object({
  dnsName: z.string().min(1),
  targets: z
    .array(z.string())
    .nullish()
    .transform((targets) => targets ?? []),
  recordType: z.string().min(1),
  setIdentifier: z.string().optional(),
  recordTTL: z.number().int().nonnegative().optional(),
  labels: z
    .record(z.string())
    .nullish()
    .transform((labels) => labels ?? {}),
  providerSpecific: z
    .array(providerSpecificSchema)
    .nullish()
    .transform((properties) => properties ?? undefined),
});

const endpointListSchema = z
  .array(endpointSchema)
  .nullish()
  .transform((endpoints) => endpoints ?? []);

export const endpointsSchema = z.array(endpointSchema);

/**
 * Change batch. Both the lower camel case and the capitalised field names
 * emitted by different external-dns releases are accepted.
 */
export const changesSchema = z
  .object({
    create: endpointListSchema,
    updateOld: endpointListSchema,
    updateNew: endpointListSchema,
    delete: endpointListSchema,
    Create: endpointListSchema,
    UpdateOld: endpointListSchema,
    UpdateNew: endpointListSchema,
    Delete: endpointListSchema,
  })
  .transform((changes) => ({
    create: [...changes.create, ...changes.Create],
    updateOld: [...changes.updateOld, ...changes.UpdateOld],
    updateNew: [...changes.updateNew, ...changes.UpdateNew],
    delete: [...changes.delete, ...changes.Delete],
  }));

export type EndpointInput = z.infer<typeof endpointSchema>;
export type ChangesInput = z.infer<typeof changesSchema>;
