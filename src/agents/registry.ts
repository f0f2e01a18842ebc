import { ValidationError } from "../errors.js";
import type { AgentRole } from "../planner/types.js";
import type { AgentAdapter } from "./adapter.js";

/**
 * Agents by name. Role lookup prefers a specialist that declares the role
 * and falls back to the first agent that declares none.
 */
export class AgentRegistry {
  private agents = new Map<string, AgentAdapter>();

  add(agent: AgentAdapter): void {
    if (this.agents.has(agent.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Agent "${agent.name}" already registered`);
    }
    this.agents.set(agent.name, agent);
  }

  remove(name: string): boolean {
    return this.agents.delete(name);
  }

  get(name: string): AgentAdapter | undefined {
    return this.agents.get(name);
  }

  list(): AgentAdapter[] {
    return [...this.agents.values()];
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  withRole(role: AgentRole): AgentAdapter[] {
    return this.list().filter((a) => a.roles?.includes(role));
  }

  forRole(role: AgentRole): AgentAdapter | undefined {
    return this.withRole(role)[0] ?? this.list().find((a) => !a.roles || a.roles.length === 0);
  }

  /** Roles no registered agent can serve. */
  uncovered(roles: Iterable<AgentRole>): AgentRole[] {
    return [...new Set(roles)].filter((role) => !this.forRole(role));
  }
}
