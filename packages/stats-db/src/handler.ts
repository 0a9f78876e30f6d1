import { loadSettings } from "./env";
import { runSync } from "./tasks/github/github.tasks";
import type { TaskOptions } from "./tasks/github/github.tasks";

export interface HandlerResponse {
  statusCode: 200 | 500;
  headers: { "Content-Type": "text/plain" };
  isBase64Encoded: false;
  body: string;
}

export const SUCCESS_BODY = "Success";
export const FAILURE_BODY = "An error occurred during database update";

function respond(statusCode: 200 | 500, body: string): HandlerResponse {
  return {
    statusCode,
    headers: { "Content-Type": "text/plain" },
    isBase64Encoded: false,
    body,
  };
}

/**
 * Serverless entry: one sync run configured from the environment. Never
 * rejects; any failure is logged and answered with a 500.
 */
export async function handler(
  environment: NodeJS.ProcessEnv = process.env,
  options: TaskOptions = {}
): Promise<HandlerResponse> {
  const logger = options.logger ?? console;
  try {
    const settings = loadSettings(environment);
    await runSync(settings, options);
    return respond(200, SUCCESS_BODY);
  } catch (error) {
    logger.error(`❌ ${FAILURE_BODY}:`, error);
    return respond(500, FAILURE_BODY);
  }
}
