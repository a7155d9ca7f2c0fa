// packages/contracts/src/schema/day_report_v1.ts
import { z } from "zod";
import { FaultVerdictZ } from "./fault_verdict_v1";

export const DEVICE_DIR_PATTERN = /^device_\d{3}$/;

export function isDeviceDirName(x: unknown): x is string {
  return typeof x === "string" && DEVICE_DIR_PATTERN.test(x);
}

export const IsoDayZ = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((s) => {
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
  }, { message: "must be a calendar date (YYYY-MM-DD)" });

export const DeviceOutcomeV1Z = z.discriminatedUnion("status", [
  z.object({ device_id: z.string().min(1), status: z.literal("healthy"), verdict: FaultVerdictZ }).strict(),
  z.object({ device_id: z.string().min(1), status: z.literal("faulty"), verdict: FaultVerdictZ }).strict(),
  z
    .object({
      device_id: z.string().min(1),
      status: z.literal("error"),
      error: z.object({ code: z.string().min(1), message: z.string() }).strict(),
    })
    .strict(),
]);

export const DayReportV1Z = z
  .object({
    type: z.literal("day_report_v1"),
    day: IsoDayZ,
    status: z.enum(["no_data", "no_devices", "evaluated"]),
    config_profile: z.string().min(1),
    effective_config_hash: z.string().startsWith("sha256:"),
    workers: z.number().int().nonnegative(), // 0 when nothing ran
    devices: z.array(DeviceOutcomeV1Z),
  })
  .strict();

export type DeviceOutcomeV1 = z.infer<typeof DeviceOutcomeV1Z>;
export type DayReportV1 = z.infer<typeof DayReportV1Z>;
