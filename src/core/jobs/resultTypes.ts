const IDENTIFIER_PATTERN = /<identifier>\s*([^<]*?)\s*<\/identifier>/g;

/**
 * Result type identifiers from a `resulttypes` body. The dispatcher answers with XML
 * (`<types><type><identifier>out</identifier>...`); plain bodies are read one type per line.
 */
export const parseResultTypeIdentifiers = (body: string): string[] => {
  const fromXml = Array.from(body.matchAll(IDENTIFIER_PATTERN), (match) => match[1]).filter(
    (identifier) => identifier !== ""
  );
  if (fromXml.length > 0) return fromXml;

  return body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("<"));
};
