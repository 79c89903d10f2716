import { PipelineError, errorMessage } from "../errors";

/**
 * Runs `attempt` against each model id in order and returns the first success.
 * When every id fails, the last failure becomes the cause of a `model` error.
 */
export async function withModelFallback<T>(
  models: readonly string[],
  attempt: (model: string) => Promise<T>
): Promise<T> {
  if (models.length === 0) {
    throw new PipelineError("model", "No model identifiers configured");
  }

  let lastError: unknown;
  for (const model of models) {
    try {
      return await attempt(model);
    } catch (err) {
      lastError = err;
      console.warn(`  [Model] ${model} failed: ${errorMessage(err)}`);
    }
  }

  throw new PipelineError(
    "model",
    `All models failed (${models.join(", ")}): ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}
