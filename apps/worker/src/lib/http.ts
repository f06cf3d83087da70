import { getHost } from "@cadence/core";
import type { HostThrottle } from "./throttle";

export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpResponse = {
  url: string;
  status: number;
  contentType: string;
  body: string;
};

export type HttpClientOptions = {
  userAgent: string;
  timeoutMs: number;
  throttle: HostThrottle;
  fetchImpl?: FetchLike;
};

export class HttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** GET through the shared host throttle; non-2xx responses throw `HttpError`. */
  async get(url: string, accept = "*/*"): Promise<HttpResponse> {
    const response = await this.request(url, accept);
    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpError(url, response.status);
    }
    return {
      url: response.url || url,
      status: response.status,
      contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
      body: await response.text()
    };
  }

  /** Like `get`, but hands back non-2xx responses instead of throwing. */
  async getAllowingErrors(url: string, accept = "*/*"): Promise<HttpResponse> {
    const response = await this.request(url, accept);
    if (!response.ok) {
      await response.body?.cancel();
    }
    return {
      url: response.url || url,
      status: response.status,
      contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
      body: response.ok ? await response.text() : ""
    };
  }

  private async request(url: string, accept: string) {
    await this.options.throttle.wait(getHost(url));
    return this.fetchImpl(url, {
      headers: {
        "User-Agent": this.options.userAgent,
        Accept: accept
      },
      redirect: "follow",
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });
  }
}
