import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { IsoDayZ } from "@wristcheck/contracts";
import { ConfigurationError } from "@wristcheck/fault-kernel";

import { MonitorConfigPatchRejected } from "./config";
import { yesterday } from "./env";
import type { MonitorRuntime } from "./runtime";

const RunDayBodyZ = z
  .object({
    date: IsoDayZ.optional(),
    options: z
      .object({
        workers: z.number().int().positive().optional(),
        config_profile: z.string().min(1).optional(),
        config_patch: z.unknown().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const ManifestQueryZ = z.object({ profile: z.string().min(1).optional() }).passthrough();

export function registerMonitorRoutes(app: FastifyInstance, runtime: MonitorRuntime): void {
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof MonitorConfigPatchRejected) {
      return reply.code(err.status).send({ ok: false, errors: err.errors });
    }
    if (err instanceof ConfigurationError) {
      return reply.code(400).send({ ok: false, error: err.message });
    }
    req.log.error({ err }, "request failed");
    return reply.code(500).send({ ok: false, error: "internal error" });
  });

  app.get("/api/monitor/health", async (_req, reply) => {
    return reply.send({ ok: true });
  });

  app.get("/api/monitor/config/manifest", async (req, reply) => {
    const q = ManifestQueryZ.safeParse(req.query ?? {});
    if (!q.success) return reply.code(400).send({ ok: false, error: "invalid query" });
    return reply.send(runtime.manifest(q.data.profile));
  });

  app.post("/api/monitor/run_day", async (req, reply) => {
    const body = RunDayBodyZ.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.code(400).send({
        ok: false,
        error: body.error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; "),
      });
    }

    const day = body.data.date ?? yesterday();
    const report = await runtime.runDay(day, body.data.options ?? {});
    return reply.send(report);
  });
}
