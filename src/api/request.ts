import type { LedgerViolation } from "../ledger/types.js";
import type { HttpMethod, LedgerRequest, ParsedRequest, ResourceName } from "./types.js";

const METHODS: readonly HttpMethod[] = ["GET", "POST", "PATCH", "DELETE"];
const RESOURCES: readonly ResourceName[] = ["milestones", "tasks"];

export function badRequest(message: string, context: Record<string, unknown> = {}): LedgerViolation {
  return { type: "BadRequest", message, context };
}

function isMethod(value: string): value is HttpMethod {
  return METHODS.some((method) => method === value);
}

function isResource(value: string): value is ResourceName {
  return RESOURCES.some((resource) => resource === value);
}

/** `/tasks/T-1101` -> `{ resource: "tasks", id: "T-1101" }`. */
export function splitPath(path: string): { resource: ResourceName; id?: string } | null {
  const parts = path.split("/").filter((part) => part.length > 0);
  if (parts.length < 1 || parts.length > 2) return null;
  const [resource, id] = parts;
  if (!isResource(resource)) return null;
  return id === undefined ? { resource } : { resource, id: decodeURIComponent(id) };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check the method, path and body shape. Returns the first problem found. */
export function parseRequest(
  request: LedgerRequest,
): { ok: true; value: ParsedRequest } | { ok: false; violation: LedgerViolation } {
  const method = request.method.toUpperCase();
  if (!isMethod(method)) {
    return { ok: false, violation: badRequest(`Unsupported method: ${request.method}`) };
  }
  const target = splitPath(request.path);
  if (!target) {
    return {
      ok: false,
      violation: badRequest(`Unknown path "${request.path}"; expected /milestones[/id] or /tasks[/id]`),
    };
  }

  const label = `${method} /${target.resource}`;
  if (method === "POST" && target.id !== undefined) {
    return { ok: false, violation: badRequest(`${label} must not include an id in the path`) };
  }
  if ((method === "PATCH" || method === "DELETE") && target.id === undefined) {
    return { ok: false, violation: badRequest(`${label}/{id} requires an id in the path`) };
  }
  if ((method === "POST" || method === "PATCH") && !isPlainObject(request.body)) {
    return { ok: false, violation: badRequest(`${label} requires a JSON object body`) };
  }

  return {
    ok: true,
    value: { method, resource: target.resource, id: target.id, body: request.body },
  };
}
