import express from "express";
import * as jobService from "./services/job.service.js";
import { closeDb } from "./db/index.js";

const PORT = process.env.PORT || 3001;

async function main(): Promise<void> {
  const app = express();
  app.use(express.json());

  app.post("/jobs", async (req, res) => {
    const { siteKey } = req.body ?? {};

    if (!siteKey || typeof siteKey !== "string") {
      res.status(400).json({ error: "siteKey is required" });
      return;
    }

    try {
      const job = await jobService.createJob({ siteKey });
      res.status(202).json(job);
    } catch (error) {
      console.error("Failed to create job:", error);
      res.status(500).json({ error: "Failed to create job" });
    }
  });

  app.get("/jobs/:id", async (req, res) => {
    try {
      const job = await jobService.getJob(req.params.id);

      if (!job) {
        res.status(404).json({ error: "Job not found" });
        return;
      }

      res.json(job);
    } catch (error) {
      console.error("Failed to get job:", error);
      res.status(500).json({ error: "Failed to get job" });
    }
  });

  app.post("/jobs/:id/cancel", async (req, res) => {
    try {
      const result = await jobService.cancelJob(req.params.id);

      switch (result) {
        case "not_found":
          res.status(404).json({ error: "Job not found" });
          return;
        case "already_finished":
          res.status(409).json({ error: "Job already finished" });
          return;
        default:
          res.status(202).json({ id: req.params.id, result });
      }
    } catch (error) {
      console.error("Failed to cancel job:", error);
      res.status(500).json({ error: "Failed to cancel job" });
    }
  });

  const server = app.listen(PORT, () => {
    console.log(`Worker listening on port ${PORT}`);
  });

  process.on("SIGTERM", async () => {
    console.log("Shutting down...");
    server.close();
    await jobService.shutdown();
    await closeDb();
    process.exit(0);
  });
}

main().catch((error) => {
  console.error("Worker error:", error);
  process.exit(1);
});
