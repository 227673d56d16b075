export type ErrorContext = Partial<{
  service: string;
  jobId: string;
  status: string;
  resultType: string;
  polls: number;
}>;

export type CliErrorEnvelope = {
  event: "job.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const stringContextKeys = ["service", "jobId", "status", "resultType"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const pickContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const picked: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string") picked[key] = raw;
  }
  if (typeof value.polls === "number" && Number.isFinite(value.polls)) picked.polls = value.polls;

  return Object.keys(picked).length > 0 ? picked : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.toLowerCase() ?? "");

/**
 * What a failed run prints: name, message, the error's code and a whitelisted slice of
 * its context. Causes and response bodies stay out; the stack only in debug mode.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields = isRecord(err) ? err : {};
  const context = pickContext(fields.context);

  return {
    event: "job.failed",
    name: error.name || "Error",
    message: error.message,
    ...(typeof fields.code === "string" ? { code: fields.code } : {}),
    ...(context ? { context } : {}),
    ...(typeof fields.status === "number" && Number.isFinite(fields.status) ? { status: fields.status } : {}),
    ...(includeStack && typeof error.stack === "string" ? { stack: error.stack } : {})
  };
};
