import type { ParamValue, SubmissionParams } from "./JobSession";

export const REPEATED_PARAM = "database";

const toSingleValue = (value: ParamValue): string =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : value.join(",");

const toList = (value: ParamValue): string[] =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? [String(value)]
    : [...value];

/**
 * Builds the x-www-form-urlencoded body for a run request. Every field is encoded once,
 * then each `database` entry is appended as its own `database=` pair.
 */
export const encodeSubmissionBody = (params: SubmissionParams): string => {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (key === REPEATED_PARAM) continue;
    form.append(key, toSingleValue(value));
  }

  const repeated = params[REPEATED_PARAM];
  const databasePairs =
    repeated == null ? [] : toList(repeated).map((db) => `${REPEATED_PARAM}=${encodeURIComponent(db)}`);

  return [form.toString(), ...databasePairs].filter((part) => part !== "").join("&");
};
