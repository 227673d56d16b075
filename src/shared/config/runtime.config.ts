import {
  defaultJobClientConfig,
  type JobClientConfig,
  validateJobClientConfig
} from "../../application/async-job/job.config";
import { loadEnv } from "./env";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  pollIntervalMs: { min: 100, max: 600000 },
  maxPolls: { min: 1, max: 1000000 },
  deadlineMs: { min: 1000, max: 86400000 },
  goConcurrency: { min: 1, max: 10 }
} as const;

export type RuntimeConfig = {
  jobClientConfig: JobClientConfig;
  timeoutMs: number;
  goConcurrency: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const jobClientConfig: JobClientConfig = {
    contact: loadEnv(env).EBI_CONTACT_EMAIL,
    pollIntervalMs:
      parseOptionalIntInRange(env, "JOB_POLL_INTERVAL_MS", runtimeCaps.pollIntervalMs) ??
      defaultJobClientConfig.pollIntervalMs
  };

  const maxPolls = parseOptionalIntInRange(env, "JOB_MAX_POLLS", runtimeCaps.maxPolls);
  if (maxPolls != null) jobClientConfig.maxPolls = maxPolls;

  const deadlineMs = parseOptionalIntInRange(env, "JOB_DEADLINE_MS", runtimeCaps.deadlineMs);
  if (deadlineMs != null) jobClientConfig.deadlineMs = deadlineMs;

  const timeoutMs = parseOptionalIntInRange(env, "EBI_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 30000;
  const goConcurrency = parseOptionalIntInRange(env, "GO_CONCURRENCY", runtimeCaps.goConcurrency) ?? 2;

  return { jobClientConfig: validateJobClientConfig(jobClientConfig), timeoutMs, goConcurrency };
};
