import { Agent, Dispatcher, fetch } from "undici";
import { FetchError } from "./errors";

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpGet = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultHttpGet: HttpGet = (url, init) => fetch(url, init);

export interface FetchPageOptions {
  userAgent: string;
  requestTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  httpGet?: HttpGet;
}

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

/**
 * Issues exactly one GET for `url` and resolves with the body text.
 *
 * Rejects with a `FetchError` of kind `bad_status` for any non-2xx response,
 * and of kind `transport` when the request itself fails (unreachable host,
 * malformed URL, TLS failure, timeout). There is no retry.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
  const httpGet = options.httpGet ?? defaultHttpGet;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.requestTimeoutMs);

  try {
    let response: HttpResponse;
    try {
      response = await httpGet(url, {
        method: "GET",
        headers: {
          "user-agent": options.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        signal: controller.signal,
        dispatcher: getFetchDispatcher(options.ignoreHttpsErrors),
      });
    } catch (error) {
      throw FetchError.transport(url, error);
    }

    if (!response.ok) {
      throw FetchError.badStatus(url, response.status);
    }

    try {
      return await response.text();
    } catch (error) {
      throw FetchError.transport(url, error);
    }
  } finally {
    clearTimeout(timeout);
  }
}
