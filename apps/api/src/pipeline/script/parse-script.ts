import { z } from 'zod';

const scriptPayload = z.object({ script: z.string().min(1) });

export class ScriptParseError extends Error {
  constructor(readonly content: string) {
    super(`Could not parse script from model response: ${content.slice(0, 200)}`);
    this.name = 'ScriptParseError';
  }
}

function tryParse(text: string): string | null {
  try {
    const result = scriptPayload.safeParse(JSON.parse(text));
    return result.success ? result.data.script : null;
  } catch {
    return null;
  }
}

/**
 * Models are asked for `{"script": "..."}` but sometimes wrap it in prose or
 * fences, or emit raw newlines inside the string.
 */
export function parseScriptContent(content: string): string {
  const direct = tryParse(content);
  if (direct) return direct.trim();

  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const body = content.slice(start, end + 1);
    const sliced = tryParse(body) ?? tryParse(escapeRawControlCharacters(body));
    if (sliced) return sliced.trim();
  }

  const match = /"script"\s*:\s*"((?:[^"\\]|\\.)+)"/s.exec(content);
  if (match) {
    return match[1].replace(/\\"/g, '"').replace(/\\n/g, '\n').trim();
  }
  throw new ScriptParseError(content);
}

/** Escapes raw newlines and tabs that appear inside JSON string literals. */
export function escapeRawControlCharacters(json: string): string {
  let out = '';
  let inString = false;
  let escaped = false;
  for (const char of json) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      } else if (char === '\n') {
        out += '\\n';
        continue;
      } else if (char === '\r') {
        continue;
      } else if (char === '\t') {
        out += '\\t';
        continue;
      }
    } else if (char === '"') {
      inString = true;
    }
    out += char;
  }
  return out;
}

const searchTermsPayload = z.object({
  queries: z.array(z.array(z.string())),
});

/** One keyword list per scene; scenes the model skipped get an empty list. */
export function parseSearchTerms(content: string, sceneCount: number): string[][] {
  let raw: unknown;
  try {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    raw = JSON.parse(start !== -1 && end > start ? content.slice(start, end + 1) : content);
  } catch {
    throw new Error(`Search terms response is not JSON: ${content.slice(0, 200)}`);
  }
  const parsed = searchTermsPayload.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Search terms response has an unexpected shape: ${parsed.error.issues[0]?.message}`);
  }
  return Array.from({ length: sceneCount }, (_, index) =>
    (parsed.data.queries[index] ?? [])
      .map((term) => term.trim())
      .filter((term) => term.length > 0),
  );
}
