import http from "http";
import { URL } from "url";

/**
 * Fake EBI job dispatcher for local runs and tests.
 *   POST /{service}/run/                      -> "<service>-R<n>"
 *   GET  /{service}/status/{jobId}            -> next scripted status (last one repeats)
 *   GET  /{service}/resulttypes/{jobId}       -> <types> XML
 *   GET  /{service}/result/{jobId}/{type}     -> scripted body, 400 for unknown types
 */
export type FakeJobScript = {
  statuses: string[];
  results: Record<string, string>;
};

export type FakeSubmission = {
  service: string;
  jobId: string;
  body: string;
};

type FakeJob = FakeJobScript & { polls: number };

export type FakeEbiServer = {
  server: http.Server;
  submissions: FakeSubmission[];
  statusPolls: (jobId: string) => number;
};

export const demoScript = (): FakeJobScript => ({
  statuses: ["RUNNING", "RUNNING", "FINISHED"],
  results: { out: "fake alignment output\n", sequence: ">query\nMKVLAAGIV\n" }
});

const resultTypesXml = (types: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?>\n<types>\n${types
    .map((type) => `  <type>\n    <identifier>${type}</identifier>\n  </type>`)
    .join("\n")}\n</types>\n`;

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });

export const createFakeEbiServer = (
  scriptFor: (service: string, form: URLSearchParams) => FakeJobScript = demoScript
): FakeEbiServer => {
  const jobs = new Map<string, FakeJob>();
  const submissions: FakeSubmission[] = [];
  let counter = 0;

  const reply = (res: http.ServerResponse, status: number, body: string, contentType = "text/plain") => {
    res.writeHead(status, { "content-type": contentType });
    res.end(body);
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const [service, action, jobId, resultType] = url.pathname.split("/").filter((part) => part !== "").map(decodeURIComponent);

    if (req.method === "POST" && action === "run") {
      const body = await readBody(req);
      counter += 1;
      const id = `${service}-R${counter}`;
      jobs.set(id, { ...scriptFor(service, new URLSearchParams(body)), polls: 0 });
      submissions.push({ service, jobId: id, body });
      return reply(res, 200, id);
    }

    const job = jobId == null ? undefined : jobs.get(jobId);
    if (action === "status") {
      if (!job) return reply(res, 200, "NOT_FOUND");
      const status = job.statuses[Math.min(job.polls, job.statuses.length - 1)];
      job.polls += 1;
      return reply(res, 200, status);
    }
    if (!job) return reply(res, 404, "Job not found");

    if (action === "resulttypes") {
      return reply(res, 200, resultTypesXml(Object.keys(job.results)), "application/xml");
    }
    if (action === "result" && resultType != null) {
      const body = job.results[resultType];
      return body == null ? reply(res, 400, `Invalid result type: ${resultType}`) : reply(res, 200, body);
    }
    return reply(res, 404, "Not found");
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      reply(res, 500, err instanceof Error ? err.message : String(err));
    });
  });

  return {
    server,
    submissions,
    statusPolls: (jobId) => jobs.get(jobId)?.polls ?? 0
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_EBI_PORT ?? 3998);
  createFakeEbiServer().server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake EBI job dispatcher on http://localhost:${port}`);
  });
}
