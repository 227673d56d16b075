export type JobClientConfig = {
  contact: string;
  pollIntervalMs: number;
  maxPolls?: number;
  deadlineMs?: number;
};

export type JobClientConfigInput = Partial<JobClientConfig>;

export const defaultJobClientConfig: JobClientConfig = {
  contact: "anonymous@example.org",
  pollIntervalMs: 2000
};

export const jobClientCaps = {
  pollIntervalMs: { min: 0, max: 600000 },
  maxPolls: { min: 1, max: 1000000 },
  deadlineMs: { min: 1, max: 86400000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateJobClientConfig = (config: JobClientConfig): JobClientConfig => {
  if (config.contact.trim() === "") {
    throw new Error("contact must be a non-empty string");
  }
  assertIntegerInRange(
    "pollIntervalMs",
    config.pollIntervalMs,
    jobClientCaps.pollIntervalMs.min,
    jobClientCaps.pollIntervalMs.max
  );
  if (config.maxPolls != null) {
    assertIntegerInRange("maxPolls", config.maxPolls, jobClientCaps.maxPolls.min, jobClientCaps.maxPolls.max);
  }
  if (config.deadlineMs != null) {
    assertIntegerInRange("deadlineMs", config.deadlineMs, jobClientCaps.deadlineMs.min, jobClientCaps.deadlineMs.max);
  }
  return config;
};

export const resolveJobClientConfig = (input: JobClientConfigInput = {}): JobClientConfig => {
  const config: JobClientConfig = {
    contact: input.contact?.trim() || defaultJobClientConfig.contact,
    pollIntervalMs: input.pollIntervalMs ?? defaultJobClientConfig.pollIntervalMs
  };
  if (input.maxPolls != null) config.maxPolls = input.maxPolls;
  if (input.deadlineMs != null) config.deadlineMs = input.deadlineMs;
  return validateJobClientConfig(config);
};
