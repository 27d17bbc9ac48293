import type { Feature } from './feature-usage';

export interface SupportOptions {
  timeoutMs: number;
}

/**
 * Source of the routines a generated program calls at run time. Each one
 * behaves exactly like its interpreter counterpart: `display` like the default
 * representation, `httpStep` like HttpStepClient, the renderers like
 * interpreter/output/renderers.
 */
const ROUTINES: Record<Feature, (options: SupportOptions) => string> = {
  'env-fallback': () => `
function envOr(name: string, fallback: string): string {
  const value = process.env[name];
  return value !== undefined && value !== "" ? value : fallback;
}
`,

  display: () => `
function display(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}
`,

  records: () => `
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
`,

  'path-lookup': () => `
function lookup(value: unknown, path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, key)) return null;
    current = current[key];
  }
  return current;
}
`,

  'json-encode': () => `
function jsonEncode(value: unknown): string {
  return JSON.stringify(value);
}
`,

  http: ({ timeoutMs }) => `
const REQUEST_TIMEOUT_MS = ${timeoutMs};

interface StepResult {
  body: unknown;
  status: number;
  headers: Record<string, string>;
}

async function runStep(name: string, run: () => Promise<StepResult>): Promise<StepResult> {
  try {
    return await run();
  } catch (error) {
    throw new Error(\`step "\${name}" failed: \${errorMessage(error)}\`);
  }
}

function parseBody(text: string): unknown {
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function httpStep(
  method: string,
  url: unknown,
  headers: unknown,
  body: unknown,
  signal?: AbortSignal,
): Promise<StepResult> {
  const requestHeaders: Record<string, string> = {};
  if (headers !== undefined) {
    if (!isRecord(headers)) throw new Error("headers must be an object");
    for (const [key, value] of Object.entries(headers)) requestHeaders[key] = display(value);
  }
  const requestBody = body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, REQUEST_TIMEOUT_MS);
  const forwardAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  let response: Response;
  let text: string;
  try {
    response = await fetch(display(url), {
      method,
      headers: requestHeaders,
      body: requestBody,
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(timedOut ? \`request timed out after \${REQUEST_TIMEOUT_MS}ms\` : "request aborted");
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new Error(\`HTTP \${response.status}: \${text}\`);
  }
  const responseHeaders: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    responseHeaders[key.toLowerCase()] = value;
  });
  return { body: parseBody(text), status: response.status, headers: responseHeaders };
}
`,

  'render-json': () => `
function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\\n";
}
`,

  'render-table': () => `
function renderTable(value: unknown, columns: string[]): string {
  if (!Array.isArray(value)) throw new Error("table output requires an array");
  let header = columns;
  if (header.length === 0 && isRecord(value[0])) header = Object.keys(value[0]);
  if (header.length === 0) return "";
  const lines = [header.join("\\t")];
  for (const row of value) {
    if (!isRecord(row)) continue;
    lines.push(header.map((column) => (Object.prototype.hasOwnProperty.call(row, column) ? display(row[column]) : "")).join("\\t"));
  }
  return lines.map((line) => line + "\\n").join("");
}
`,

  'render-text': () => `
function renderText(value: unknown): string {
  return display(value) + "\\n";
}
`
};

/** Emission order; helpers come before the routines that call them */
const ORDER: readonly Feature[] = [
  'env-fallback',
  'display',
  'records',
  'path-lookup',
  'json-encode',
  'http',
  'render-json',
  'render-table',
  'render-text'
];

const ERROR_MESSAGE = `
function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error) return String(error.message);
  return String(error);
}
`;

/**
 * Source for every routine in `features`, and nothing else. `errorMessage` is
 * always present since every program reports run failures.
 */
export function supportRoutines(features: ReadonlySet<Feature>, options: SupportOptions): string {
  return [ERROR_MESSAGE, ...ORDER.filter(feature => features.has(feature)).map(feature => ROUTINES[feature](options))]
    .map(chunk => chunk.trim())
    .join('\n\n');
}
