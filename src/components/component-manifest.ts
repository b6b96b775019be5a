/**
 * Component manifest (`component.json`) schema.
 */

import { z } from 'zod';

export const componentManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
  main: z.string().min(1).optional(),
  env: z.record(z.unknown()).default({})
});

export type ComponentManifest = z.infer<typeof componentManifestSchema>;

export type ComponentLocation = {
  manifest: ComponentManifest;
  dir: string;
};
