import { BackendInferenceError, errorMessage } from "../../utils/errors";

// Statuses a model server uses for memory or load pressure
const RESOURCE_STATUSES = new Set([413, 429, 503, 507]);

/**
 * POST a JSON body to a local model server and return the parsed reply
 */
export async function postJson(
  url: string,
  body: unknown,
  timeoutMs: number
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new BackendInferenceError(`Request to ${url} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => "");
    throw new BackendInferenceError(
      `${url} responded ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
      { resource: RESOURCE_STATUSES.has(response.status) }
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new BackendInferenceError(`Malformed response from ${url}`, { cause: error });
  }
}

export async function probe(url: string, timeoutMs: number): Promise<boolean> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    return response.ok;
  } catch {
    return false;
  }
}
