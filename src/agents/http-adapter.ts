import { getConfig } from "../config.js";
import type { AgentRole } from "../planner/types.js";
import { AgentResponseSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { AgentAdapter, AgentRequest, AgentResponse } from "./adapter.js";

const log = createLogger("http-agent");

export type HttpAdapterOptions = {
  name: string;
  url: string;
  headers?: Record<string, string>;
  roles?: AgentRole[];
};

/**
 * Agent service reached over HTTP: the request is POSTed as JSON, the body
 * is either an AgentResponse object or plain text output.
 */
export class HttpAdapter implements AgentAdapter {
  readonly name: string;
  readonly type = "http" as const;
  readonly roles?: AgentRole[];

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpAdapterOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.roles = opts.roles;
  }

  async execute(request: AgentRequest, signal: AbortSignal): Promise<AgentResponse> {
    log.debug(`[${this.name}] POST ${this.url} for task "${request.taskId}"`);

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify(request),
      signal,
    });
    const body = await res.text();

    if (!res.ok) {
      return { success: false, output: "", error: `HTTP ${res.status}: ${body.slice(0, 500)}` };
    }
    return parseBody(body);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.healthCheck),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }
}

function parseBody(body: string): AgentResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { success: true, output: body };
  }
  const parsed = AgentResponseSchema.safeParse(json);
  return parsed.success ? parsed.data : { success: true, output: body };
}
