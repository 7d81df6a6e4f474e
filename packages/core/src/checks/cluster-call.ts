import { VerificationError, errorMessage } from "../internal/errors.js";
import type { CheckContext } from "../pipeline/handler.js";

/**
 * Runs one cluster API request. The signal is checked first since the client
 * takes none; failures become INFRASTRUCTURE errors naming the request.
 */
export async function clusterCall<T>(
  ctx: CheckContext,
  description: string,
  call: () => Promise<T>,
): Promise<T> {
  ctx.signal.throwIfAborted();
  try {
    return await call();
  } catch (err) {
    throw VerificationError.infrastructure(
      "CLUSTER_REQUEST_FAILED",
      `failed to ${description}: ${errorMessage(err)}`,
      err,
    );
  }
}
