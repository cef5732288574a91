import path from 'node:path';
import { z } from 'zod';

/**
 * Container image reference rules:
 * - Must start with an alphanumeric (never a leading dash that the engine CLI would read as a flag)
 * - Registry host, path, tag and digest characters only; no whitespace
 */
export const imageReferenceSchema = z
  .string()
  .min(1, 'Image reference cannot be empty')
  .max(255, 'Image reference must be 255 characters or less')
  .regex(
    /^[a-zA-Z0-9][a-zA-Z0-9._\-/:@]*$/,
    'Image reference must start with an alphanumeric and contain only registry, path, tag and digest characters'
  );

/**
 * Host volume paths are bind-mounted, so they must be absolute
 */
export const hostPathSchema = z
  .string()
  .min(1, 'Path cannot be empty')
  .refine((value) => path.isAbsolute(value), 'Path must be absolute');

/**
 * GPU device ids: indexes ("0") or device UUIDs ("GPU-8f6c...")
 */
export const gpuIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9-]+$/, 'GPU id must be an index or device UUID');

export const runRequestSchema = z.object({
  image: imageReferenceSchema,
  inputPath: hostPathSchema,
  outputPath: hostPathSchema,
  gpus: z.array(gpuIdSchema).max(64).default([]),
  args: z.array(z.string().max(4096)).max(256).default([]),
  engineExecutable: z.string().min(1).optional(),
});

export const jobIdParamsSchema = z.object({
  id: z.string().uuid('Job id must be a UUID'),
});

export const modelIdParamsSchema = z.object({
  id: z.string().min(1).max(255),
});

export const modelSearchQuerySchema = z.object({
  q: z.string().max(200).optional(),
});

/**
 * Boolean flags in query strings ("true" / "1")
 */
export const booleanQueryFlag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

export type RunRequestInput = z.input<typeof runRequestSchema>;
export type ValidRunRequest = z.infer<typeof runRequestSchema>;

/**
 * Format zod issues as "path: message" strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}
