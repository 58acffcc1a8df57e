import { z } from "zod";
import { ValidationError } from "../errors.js";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "URL must use http or https" });

/** One dataset's metadata. `id` is caller-assigned and unique within the store. */
export const datasetRecordSchema = z.object({
  id: z.string().refine((s) => s.trim().length > 0, "id is required"),
  name: z.string().refine((s) => s.trim().length > 0, "name is required"),
  url: httpUrl,
  /** ISO-8601 date or date-time, offset optional; compared lexicographically by `queryLatest`. */
  updated: z.union([z.string().datetime({ offset: true, local: true }), z.string().date()]).optional(),
  rows: z.number().int().nonnegative().optional(),
  columns: z.array(z.string()).optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export type DatasetRecord = z.infer<typeof datasetRecordSchema>;

/**
 * Validate an untrusted value as a dataset record.
 * @throws ValidationError listing every failing field
 */
export function parseDatasetRecord(value: unknown): DatasetRecord {
  const parsed = datasetRecordSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new ValidationError(`Invalid dataset record: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`, issues);
  }
  return parsed.data;
}
