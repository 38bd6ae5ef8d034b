import { z } from 'zod';
import { JOB_STATUSES } from '../lifecycle/job-state.js';
import type { Job } from '../types/job.js';

export const JobStatusSchema = z.enum(JOB_STATUSES);

export const MAX_INPUT_BYTES = 64 * 1024;

export const RunSkillSchema = z.object({
  input_text: z
    .string()
    .refine((text) => Buffer.byteLength(text, 'utf8') <= MAX_INPUT_BYTES, {
      message: `input_text exceeds ${MAX_INPUT_BYTES} bytes`,
    })
    .default(''),
});

export const SkillParamsSchema = z.object({
  skillId: z.string().min(1),
});

export const JobParamsSchema = z.object({
  jobId: z.string().uuid(),
});

export const JobListQuerySchema = z.object({
  status: JobStatusSchema.optional(),
  skill_id: z.string().min(1).optional(),
  cursor: z.string().uuid().optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(100)
  ),
});

// Integer ids from the platform tables arrive as numbers
const IdTextSchema = z.union([z.string(), z.number().int()]).transform(String);

/** Shape of a `run_jobs` row as returned by the database driver. */
export const JobRowSchema = z.object({
  id: z.string(),
  skill_id: IdTextSchema,
  requested_by: IdTextSchema,
  input_text: z.string(),
  status: JobStatusSchema,
  output_text: z.string(),
  error_text: z.string(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export const ClaimRowSchema = JobRowSchema.pick({ id: true, skill_id: true, input_text: true });

export type RunSkillRequest = z.infer<typeof RunSkillSchema>;
export type JobListQuery = z.infer<typeof JobListQuerySchema>;
export type JobRow = z.infer<typeof JobRowSchema>;

export interface JobOut {
  id: string;
  skill_id: string;
  requested_by: string;
  input_text: string;
  status: Job['status'];
  output_text: string;
  error_text: string;
  created_at: string;
  updated_at: string;
}

export function toJobOut(job: Job): JobOut {
  return {
    id: job.id,
    skill_id: job.skillId,
    requested_by: job.requestedBy,
    input_text: job.inputText,
    status: job.status,
    output_text: job.outputText,
    error_text: job.errorText,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}

export function fromJobRow(row: JobRow): Job {
  return {
    id: row.id,
    skillId: row.skill_id,
    requestedBy: row.requested_by,
    inputText: row.input_text,
    status: row.status,
    outputText: row.output_text,
    errorText: row.error_text,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
