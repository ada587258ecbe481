import { loadConfig } from "../../config.js";
import { createServices, type Services } from "../../services/index.js";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the service graph for one command and tear it down afterwards.
 * The background sync loop is never started from the CLI.
 */
export async function withServices<T>(
  fn: (services: Services) => Promise<T>
): Promise<T> {
  const services = createServices(loadConfig());
  try {
    return await fn(services);
  } finally {
    await services.close();
  }
}
