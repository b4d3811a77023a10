import { z } from 'zod';

// ============================================================================
// MANIFEST SCHEMA
// ============================================================================

export const ManifestChunkPartSchema = z.record(z.string(), z.unknown());

export const ManifestFileEntrySchema = z
  .object({
    Filename: z.string().min(1),
    FileHash: z.string(),
    FileChunkParts: z.array(ManifestChunkPartSchema).optional(),
  })
  .passthrough();

export const ManifestSchema = z
  .object({
    ManifestFileVersion: z.string(),
    AppID: z.string().optional(),
    AppNameString: z.string(),
    BuildVersionString: z.string(),
    FileManifestList: z.array(ManifestFileEntrySchema),
  })
  .passthrough();

export type ManifestDocument = z.infer<typeof ManifestSchema>;

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path || '(root)'}: ${issue.message}`;
  });
}
