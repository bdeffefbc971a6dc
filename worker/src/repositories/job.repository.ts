import { eq } from "drizzle-orm";
import { db } from "../db/index.js";
import { jobs, type Job, type NewJob, type JobStatus } from "../db/schema.js";
import type { JobLogEntry, JobProgress, JobUrlEntry } from "../job.js";

export interface JobUpdateData {
  status?: JobStatus;
  progress?: JobProgress;
  log?: JobLogEntry[];
  urls?: JobUrlEntry[];
  error?: string;
  startedAt?: Date;
  completedAt?: Date;
}

export async function createJob(data: NewJob): Promise<Job> {
  const [job] = await db.insert(jobs).values(data).returning();
  return job;
}

export async function findJobById(id: string): Promise<Job | undefined> {
  const [job] = await db.select().from(jobs).where(eq(jobs.id, id)).limit(1);
  return job;
}

export async function updateJob(
  id: string,
  data: JobUpdateData
): Promise<Job | undefined> {
  const [job] = await db
    .update(jobs)
    .set(data)
    .where(eq(jobs.id, id))
    .returning();
  return job;
}
