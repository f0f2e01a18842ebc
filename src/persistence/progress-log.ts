import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { KnowledgeEntry, KnowledgeSink } from "../executor/types.js";
import type { TerminalStatus } from "../planner/types.js";

const ICONS: Record<TerminalStatus, string> = {
  succeeded: "x",
  failed: "!",
  timed_out: "?",
};

function hhmm(timestamp: number): string {
  const d = new Date(timestamp);
  return `${String(d.getHours()).padStart(2, "0")}:${String(d.getMinutes()).padStart(2, "0")}`;
}

/** One markdown checklist line per outcome. */
export function formatProgressLine(entry: KnowledgeEntry): string {
  return `- [${ICONS[entry.status]}] [${entry.role}] ${entry.summary} (${hhmm(entry.timestamp)})`;
}

/** Appends task outcomes to a markdown progress file. */
export class ProgressLog implements KnowledgeSink {
  readonly path: string;
  private ready?: Promise<unknown>;

  constructor(path: string) {
    this.path = path;
  }

  async append(entry: KnowledgeEntry): Promise<void> {
    // A failed mkdir is not cached; the next append tries again.
    this.ready ??= mkdir(dirname(this.path), { recursive: true }).catch((err: unknown) => {
      this.ready = undefined;
      throw err;
    });
    await this.ready;
    await appendFile(this.path, formatProgressLine(entry) + "\n", "utf8");
  }
}
