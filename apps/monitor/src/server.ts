import Fastify from "fastify";

import { ConsoleAlertSink } from "./alerts";
import { loadEnv, readMonitorEnv } from "./env";
import { registerMonitorRoutes } from "./routes";
import { MonitorRuntime } from "./runtime";

loadEnv();

const settings = readMonitorEnv();

const app = Fastify({ logger: { level: settings.logLevel } });

async function main(): Promise<void> {
  const runtime = new MonitorRuntime({
    bucketPath: settings.bucketPath,
    logger: app.log,
    alerts: new ConsoleAlertSink(),
    defaultProfile: settings.profile,
    defaultWorkers: settings.workers,
  });

  // Fail fast on a broken default profile.
  runtime.manifest();

  registerMonitorRoutes(app, runtime);
  await app.listen({ port: settings.port, host: settings.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
