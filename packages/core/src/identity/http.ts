import { VerificationError, errorMessage } from "../internal/errors.js";

export type FetchFn = typeof fetch;

export interface JsonGetCodes {
  unreachable: string;
  non200: string;
  malformed: string;
}

/**
 * GETs `url` and parses the body as JSON. Network failures, non-200 answers
 * and unparseable bodies each surface as INFRASTRUCTURE errors with their own
 * code. Cancellation propagates unchanged.
 */
export async function getJson(
  fetchFn: FetchFn,
  url: string,
  signal: AbortSignal,
  codes: JsonGetCodes,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchFn(url, { method: "GET", signal, headers: { accept: "application/json" } });
  } catch (err) {
    signal.throwIfAborted();
    throw VerificationError.infrastructure(
      codes.unreachable,
      `GET ${url} failed: ${errorMessage(err)}`,
      err,
    );
  }

  if (response.status !== 200) {
    throw VerificationError.infrastructure(
      codes.non200,
      `GET ${url} returned HTTP ${response.status}`,
    );
  }

  try {
    return await response.json();
  } catch (err) {
    signal.throwIfAborted();
    throw VerificationError.infrastructure(
      codes.malformed,
      `GET ${url} returned a body that is not JSON: ${errorMessage(err)}`,
      err,
    );
  }
}
