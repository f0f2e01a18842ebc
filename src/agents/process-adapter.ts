import { spawn } from "node:child_process";
import { getConfig } from "../config.js";
import { AgentError } from "../errors.js";
import type { AgentRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { AgentAdapter, AgentRequest, AgentResponse } from "./adapter.js";

const log = createLogger("process-agent");

export type ArgsBuilder = (request: AgentRequest, prompt: string) => string[];

export type ProcessAdapterOptions = {
  name: string;
  /** Executable to spawn, e.g. an AI command-line client. */
  command: string;
  buildArgs?: ArgsBuilder;
  /** Prepended to the description for the given role. */
  rolePrompts?: Partial<Record<AgentRole, string>>;
  roles?: AgentRole[];
  cwd?: string;
  env?: Record<string, string>;
  killGraceMs?: number;
};

const THINKING_FLAGS = new Set(["extended", "max"]);

/** Arguments for a CLI that takes `-p <prompt> --model <name> [--thinking-budget n]`. */
export const defaultArgs: ArgsBuilder = (request, prompt) => {
  const args = ["-p", prompt, "--model", getConfig().models[request.modelClass]];
  if (THINKING_FLAGS.has(request.thinking) && request.thinkingBudget > 0) {
    args.push("--thinking-budget", String(request.thinkingBudget));
  }
  return args;
};

/**
 * Runs each task as a child process. Exit code 0 is success with stdout as
 * output; any other exit is a failure carrying stderr. When the signal
 * aborts, the child gets SIGTERM and, after a grace period, SIGKILL.
 */
export class ProcessAdapter implements AgentAdapter {
  readonly name: string;
  readonly type = "process" as const;
  readonly roles?: AgentRole[];

  private command: string;
  private buildArgs: ArgsBuilder;
  private rolePrompts: Partial<Record<AgentRole, string>>;
  private cwd?: string;
  private env: Record<string, string>;
  private killGraceMs: number;

  constructor(opts: ProcessAdapterOptions) {
    this.name = opts.name;
    this.command = opts.command;
    this.buildArgs = opts.buildArgs ?? defaultArgs;
    this.rolePrompts = opts.rolePrompts ?? {};
    this.roles = opts.roles;
    this.cwd = opts.cwd;
    this.env = opts.env ?? {};
    this.killGraceMs = opts.killGraceMs ?? getConfig().timeouts.killGrace;
  }

  async execute(request: AgentRequest, signal: AbortSignal): Promise<AgentResponse> {
    signal.throwIfAborted();
    const rolePrompt = this.rolePrompts[request.role];
    const prompt = rolePrompt ? `${rolePrompt}\n\n## Current Task\n\n${request.description}` : request.description;
    const args = this.buildArgs(request, prompt);

    return new Promise<AgentResponse>((resolve, reject) => {
      const proc = spawn(this.command, args, {
        cwd: this.cwd,
        env: { ...process.env, ...this.env },
        stdio: ["ignore", "pipe", "pipe"],
      });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let killTimer: ReturnType<typeof setTimeout> | null = null;
      let aborted = false;

      const onAbort = (): void => {
        aborted = true;
        log.warn(`[${this.name}] Terminating task "${request.taskId}"`, { pid: proc.pid });
        proc.kill("SIGTERM");
        killTimer = setTimeout(() => proc.kill("SIGKILL"), this.killGraceMs);
      };
      const cleanup = (): void => {
        signal.removeEventListener("abort", onAbort);
        if (killTimer !== null) clearTimeout(killTimer);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      proc.on("error", (err) => {
        cleanup();
        reject(new AgentError(`Failed to start "${this.command}": ${err.message}`, { command: this.command }));
      });

      proc.on("close", (code, sig) => {
        cleanup();
        if (aborted) {
          reject(signal.reason instanceof Error ? signal.reason : new AgentError(`Task "${request.taskId}" aborted`));
          return;
        }
        const output = Buffer.concat(stdout).toString("utf-8");
        if (code === 0) {
          resolve({ success: true, output });
          return;
        }
        const errText = Buffer.concat(stderr).toString("utf-8").trim();
        resolve({
          success: false,
          output,
          error: `${this.command} exited with ${code ?? sig ?? "unknown"}${errText ? `: ${errText.slice(0, 2000)}` : ""}`,
        });
      });
    });
  }
}
