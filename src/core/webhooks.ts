import { WebhookError } from "../types/errors";
import type { WebhookTarget } from "./config";
import type { Logger } from "./logger";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WebhookResult {
  service: string;
  status: number;
}

export interface TriggerOptions {
  fetch?: FetchLike;
  logger: Logger;
}

/**
 * POSTs to each rebuild trigger in list order, one at a time.
 * A network error or timeout aborts the rest. A non-2xx status is only logged,
 * unless the webhook sets failOnHttpError.
 */
export async function triggerRebuilds(
  webhooks: WebhookTarget[],
  opts: TriggerOptions,
): Promise<WebhookResult[]> {
  const doFetch = opts.fetch ?? fetch;
  const results: WebhookResult[] = [];
  for (const hook of webhooks) {
    opts.logger.info(`triggering rebuild of ${hook.service}`);
    const status = await postTrigger(doFetch, hook);
    opts.logger.info(`${hook.service}: HTTP ${status}`);
    results.push({ service: hook.service, status });
  }
  return results;
}

async function postTrigger(doFetch: FetchLike, hook: WebhookTarget): Promise<number> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), hook.timeoutMs);
  const transportFailure = (err: unknown): never => {
    throw new WebhookError(hook.service, hook.url, undefined, err);
  };
  try {
    const response = await doFetch(hook.url, {
      method: "POST",
      signal: controller.signal,
    }).catch(transportFailure);
    // body is discarded; read it so the connection is released
    await response.arrayBuffer().catch(transportFailure);
    if (!response.ok && hook.failOnHttpError) {
      throw new WebhookError(hook.service, hook.url, response.status);
    }
    return response.status;
  } finally {
    clearTimeout(timeout);
  }
}
