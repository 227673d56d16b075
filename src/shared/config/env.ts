export type LockStoreKind = "file" | "mongo";

export type Env = {
  EBI_SERVICE_URL: string;
  EBI_DBFETCH_URL: string;
  UNIPROT_URL: string;
  QUICKGO_URL: string;
  EBI_CONTACT_EMAIL: string;
  LOCK_STORE: LockStoreKind;
  LOCK_DIR: string;
  MONGO_URI: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parseLockStoreKind = (value: string | undefined): LockStoreKind => {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (normalized === "" || normalized === "file") return "file";
  if (normalized === "mongo") return "mongo";
  throw new Error(`LOCK_STORE must be one of file, mongo. Received: ${value}`);
};

const nonBlank = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value.trim() : undefined;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const EBI_SERVICE_URL = validateHttpUrl(
    "EBI_SERVICE_URL",
    env.EBI_SERVICE_URL ?? "https://www.ebi.ac.uk/Tools/services/rest"
  );
  const EBI_DBFETCH_URL = validateHttpUrl(
    "EBI_DBFETCH_URL",
    env.EBI_DBFETCH_URL ?? "https://www.ebi.ac.uk/Tools/dbfetch/dbfetch"
  );
  const UNIPROT_URL = validateHttpUrl("UNIPROT_URL", env.UNIPROT_URL ?? "https://rest.uniprot.org");
  const QUICKGO_URL = validateHttpUrl("QUICKGO_URL", env.QUICKGO_URL ?? "https://www.ebi.ac.uk/QuickGO/services");
  const EBI_CONTACT_EMAIL = nonBlank(env.EBI_CONTACT_EMAIL) ?? "anonymous@example.org";
  const LOCK_STORE = parseLockStoreKind(env.LOCK_STORE);
  const LOCK_DIR = nonBlank(env.LOCK_DIR) ?? ".";
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/ebi_jobs";

  return {
    EBI_SERVICE_URL,
    EBI_DBFETCH_URL,
    UNIPROT_URL,
    QUICKGO_URL,
    EBI_CONTACT_EMAIL,
    LOCK_STORE,
    LOCK_DIR,
    MONGO_URI
  };
};
