import type { Job, JobStatus } from "../db/schema.js";
import {
  emptyProgress,
  type JobLogEntry,
  type JobProgress,
  type JobSnapshot,
  type JobUrlEntry,
} from "../job.js";

export interface CreateJobDto {
  siteKey: string;
}

export interface JobResponseDto {
  id: string;
  siteKey: string;
  status: JobStatus;
  progress: JobProgress;
  log: JobLogEntry[];
  urls: JobUrlEntry[];
  error?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface JobCreatedDto {
  id: string;
  status: JobStatus;
}

export function toJobResponseDto(job: Job): JobResponseDto {
  return {
    id: job.id,
    siteKey: job.siteKey,
    status: job.status,
    progress: job.progress ?? { ...emptyProgress() },
    log: job.log ?? [],
    urls: job.urls ?? [],
    error: job.error ?? undefined,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function snapshotToJobResponseDto(job: JobSnapshot): JobResponseDto {
  return {
    id: job.id,
    siteKey: job.siteKey,
    status: job.status,
    progress: { ...job.progress },
    log: job.log.slice(),
    urls: job.urls.map((entry) => ({ ...entry })),
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function toJobCreatedDto(job: Pick<Job, "id" | "status">): JobCreatedDto {
  return {
    id: job.id,
    status: job.status,
  };
}
