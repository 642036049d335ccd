import type { Task } from "../types.js";
import { NoPlanLoadedError } from "./errors.js";

export type LoadedPlan = {
  tasks: readonly Task[];
  source: string;
  loadedAt: string; // ISO timestamp
};

/** The plan the running service answers questions about. Replaced whole, never edited. */
export class PlanSession {
  private current: LoadedPlan | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  load(tasks: readonly Task[], source: string): LoadedPlan {
    this.current = Object.freeze({
      tasks: Object.freeze([...tasks]),
      source,
      loadedAt: this.now().toISOString(),
    });
    return this.current;
  }

  get(): LoadedPlan | null {
    return this.current;
  }

  require(): LoadedPlan {
    if (!this.current) throw new NoPlanLoadedError();
    return this.current;
  }

  clear(): void {
    this.current = null;
  }
}
