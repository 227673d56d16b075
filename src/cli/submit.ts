#!/usr/bin/env node
import { type RunJobRequest, runJob } from "../composition/root";
import type { ParamValue } from "../core/jobs/JobSession";
import { buildCliErrorEnvelope, isDebugMode } from "./errorEnvelope";

export const usage = "Usage: ebi-job <service> key=value [key=value ...] [--result <type>]...";

/**
 * `<service> key=value ... --result type`. A key given more than once becomes a list
 * (how several BLAST databases are passed); `--result` defaults to "out".
 */
export const parseCliArgs = (argv: readonly string[]): RunJobRequest => {
  const [service, ...rest] = argv;
  if (service == null || service.startsWith("-")) {
    throw new Error(usage);
  }

  const params: Record<string, ParamValue> = {};
  const resultTypes: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (arg === "--result") {
      const type = rest[i + 1];
      if (type == null || type.startsWith("-")) throw new Error(`--result needs a value. ${usage}`);
      resultTypes.push(type);
      i += 1;
      continue;
    }
    if (arg.startsWith("--result=")) {
      resultTypes.push(arg.slice("--result=".length));
      continue;
    }

    const eq = arg.indexOf("=");
    if (eq <= 0) throw new Error(`Expected key=value, received "${arg}". ${usage}`);
    const key = arg.slice(0, eq);
    const value = arg.slice(eq + 1);
    const existing = params[key];
    if (existing == null) {
      params[key] = value;
    } else {
      params[key] = typeof existing === "object" ? [...existing, value] : [String(existing), value];
    }
  }

  return { service, params, resultTypes: resultTypes.length > 0 ? resultTypes : ["out"] };
};

export const executeSubmitCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const output = await runJob(parseCliArgs(argv));
    const results = typeof output === "string" ? [output] : output;
    for (const result of results) {
      process.stdout.write(result.endsWith("\n") ? result : `${result}\n`);
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeSubmitCli();
}
