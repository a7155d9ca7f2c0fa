export * from "./schema/monitor_config_v1";
export * from "./schema/fault_verdict_v1";
export * from "./schema/day_report_v1";
