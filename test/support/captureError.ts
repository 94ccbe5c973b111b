import { VatifyError } from "../../src/errors";

/**
 * Awaits a promise that should reject and hands back the VatifyError.
 */
export async function captureError(promise: Promise<unknown>): Promise<VatifyError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof VatifyError) return err;
    throw err;
  }
  throw new Error("expected the call to reject with a VatifyError");
}
