/**
 * Resource types for Jenkins API responses.
 *
 * Each type is inferred from the zod schema that decodes it, so unknown
 * fields are dropped and missing optional collections default to empty.
 *
 * @module resources
 */

import { z } from 'zod';

/**
 * Minimal build reference embedded in job payloads.
 */
export const buildSummarySchema = z.object({
  number: z.number(),
  url: z.string(),
});
export type BuildSummary = z.infer<typeof buildSummarySchema>;

/**
 * Child item listed by a folder.
 */
export const jobSummarySchema = z.object({
  name: z.string(),
  url: z.string(),
  color: z.string().optional(),
});
export type JobSummary = z.infer<typeof jobSummarySchema>;

/**
 * Job details from `/job/<name>/api/json`.
 */
export const jobSchema = z.object({
  _class: z.string().optional(),
  name: z.string(),
  fullName: z.string().optional(),
  url: z.string(),
  description: z.string().nullable().optional(),
  color: z.string().optional(),
  buildable: z.boolean().optional(),
  inQueue: z.boolean().optional(),
  nextBuildNumber: z.number().optional(),
  lastBuild: buildSummarySchema.nullable().optional(),
  builds: z.array(buildSummarySchema).default([]),
});
export type Job = z.infer<typeof jobSchema>;

/**
 * Folder details.
 */
export const folderSchema = z.object({
  _class: z.string().optional(),
  name: z.string(),
  url: z.string(),
  description: z.string().nullable().optional(),
  jobs: z.array(jobSummarySchema).default([]),
});
export type Folder = z.infer<typeof folderSchema>;

/**
 * Build details from `/job/<name>/<number>/api/json`.
 */
export const buildSchema = z.object({
  number: z.number(),
  url: z.string(),
  displayName: z.string().optional(),
  result: z.string().nullable().default(null),
  building: z.boolean().default(false),
  duration: z.number().default(0),
  estimatedDuration: z.number().default(0),
  timestamp: z.number().default(0),
  queueId: z.number().optional(),
});
export type Build = z.infer<typeof buildSchema>;

/**
 * Server summary from `/api/json`.
 */
export const serverInfoSchema = z.object({
  mode: z.string().optional(),
  nodeDescription: z.string().optional(),
  numExecutors: z.number().optional(),
  useSecurity: z.boolean().optional(),
  jobs: z.array(jobSummarySchema).default([]),
});
export type ServerInfo = z.infer<typeof serverInfoSchema>;
