import { z } from "zod";
import { RegistryApiError } from "../errors.js";

const loginResponseSchema = z.object({
  token: z.string().min(1),
});

export interface RegistryClientOptions {
  apiUrl: string;
  fetch?: typeof fetch;
}

/**
 * Minimal client for the registry's tag management API. Every response
 * status is checked; a non-2xx answer is an error.
 */
export class RegistryClient {
  private readonly apiUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: RegistryClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? fetch;
  }

  /** Exchange account credentials for a short-lived API token */
  async login(username: string, password: string): Promise<string> {
    const url = `${this.apiUrl}/v2/users/login/`;
    const response = await this.request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ username, password }),
    });

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new RegistryApiError("Registry login returned invalid JSON", url, response.status, {
        cause: error,
      });
    }

    const result = loginResponseSchema.safeParse(payload);
    if (!result.success) {
      throw new RegistryApiError(
        "Registry login response has no token",
        url,
        response.status,
      );
    }
    return result.data.token;
  }

  async deleteTag(token: string, repository: string, tag: string) {
    const url = `${this.apiUrl}/v2/repositories/${repository}/tags/${encodeURIComponent(tag)}/`;
    await this.request(url, {
      method: "DELETE",
      headers: { Authorization: `JWT ${token}` },
    });
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, redirect: "follow" });
    } catch (error) {
      throw new RegistryApiError(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        url,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new RegistryApiError(
        `${init.method ?? "GET"} ${url} returned HTTP ${response.status}`,
        url,
        response.status,
      );
    }
    return response;
  }
}
