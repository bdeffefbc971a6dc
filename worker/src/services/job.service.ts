import { JobOrchestrator, type JobSnapshot } from "../job.js";
import { optionsFromEnv } from "../lib/options.js";
import { isTerminal } from "../lib/state.js";
import * as jobRepository from "../repositories/job.repository.js";
import { listingSink } from "../repositories/listing.repository.js";
import { siteConfigProvider } from "../repositories/site-config.repository.js";
import type { CreateJobDto, JobResponseDto, JobCreatedDto } from "../dto/job.dto.js";
import {
  snapshotToJobResponseDto,
  toJobCreatedDto,
  toJobResponseDto,
} from "../dto/job.dto.js";
import type { SiteConfig } from "../lib/types.js";

export type CancelResult =
  | "cancelling"
  | "cancelled"
  | "not_found"
  | "already_finished";

const orchestrator = new JobOrchestrator({
  sink: listingSink,
  options: optionsFromEnv(),
});

const running = new Map<string, Promise<JobSnapshot>>();

export async function createJob(dto: CreateJobDto): Promise<JobCreatedDto> {
  const siteConfig = await siteConfigProvider.get(dto.siteKey);

  const job = await jobRepository.createJob({
    siteKey: dto.siteKey,
    options: { ...orchestrator.settings },
  });

  console.log(`Job ${job.id} created for site ${dto.siteKey}`);

  // Runs in the background; failures end up on the job row
  startProcessing(job.id, siteConfig);

  return toJobCreatedDto(job);
}

export async function getJob(id: string): Promise<JobResponseDto | undefined> {
  const live = orchestrator.getJob(id);
  if (live) return snapshotToJobResponseDto(live);

  const job = await jobRepository.findJobById(id);
  if (!job) return undefined;
  return toJobResponseDto(job);
}

export async function cancelJob(id: string): Promise<CancelResult> {
  if (orchestrator.cancelJob(id)) return "cancelling";

  const job = await jobRepository.findJobById(id);
  if (!job) return "not_found";
  if (isTerminal(job.status)) return "already_finished";

  // Left unfinished by an earlier process: nothing is running it any more
  await jobRepository.updateJob(id, {
    status: "cancelled",
    completedAt: new Date(),
  });
  return "cancelled";
}

/** Requests cancellation of every live job and waits for them to stop. */
export async function shutdown(): Promise<void> {
  for (const id of running.keys()) orchestrator.cancelJob(id);
  await Promise.all(running.values());
}

function startProcessing(jobId: string, siteConfig: SiteConfig | undefined): void {
  const persist = async (snapshot: JobSnapshot): Promise<void> => {
    await jobRepository.updateJob(jobId, {
      status: snapshot.status,
      progress: { ...snapshot.progress },
      log: snapshot.log.slice(),
      urls: snapshot.urls.map((entry) => ({ ...entry })),
      startedAt: snapshot.startedAt,
      completedAt: snapshot.completedAt,
    });
  };

  const finish = async (snapshot: JobSnapshot, error?: string): Promise<void> => {
    await jobRepository.updateJob(jobId, {
      status: snapshot.status,
      progress: { ...snapshot.progress },
      log: snapshot.log.slice(),
      urls: snapshot.urls.map((entry) => ({ ...entry })),
      error,
      completedAt: snapshot.completedAt,
    });
    orchestrator.removeJob(jobId);
  };

  const handle = orchestrator.launchJob(jobId, siteConfig, {
    onRunning: persist,
    onProgress: persist,
    onCompleted: (snapshot) => finish(snapshot),
    onCancelled: (snapshot) => finish(snapshot),
    onFailed: (snapshot, error) => finish(snapshot, error),
  });

  running.set(jobId, handle.done);
  void handle.done.then(() => {
    running.delete(jobId);
  });
}
