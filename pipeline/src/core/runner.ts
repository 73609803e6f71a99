import { PassDeps, PassOptions, PassReport, runPass } from "./pass";
import { ListingSource } from "./ports";

export type PassRunnerDeps = PassDeps & {
  source: ListingSource;
};

/**
 * Wraps runPass for scheduled use. Passes never overlap: a trigger that
 * arrives while one is running is dropped.
 */
export class PassRunner {
  private running = false;

  constructor(private deps: PassRunnerDeps, private options: PassOptions) {}

  async trigger(): Promise<PassReport | null> {
    if (this.running) {
      this.deps.logger.warn("Previous pass still running, skipping this trigger");
      return null;
    }

    this.running = true;
    try {
      const batch = await this.deps.source.fetchBatch();
      this.deps.logger.debug(`Fetched ${batch.length} record(s) from ${this.deps.source.name}`);
      return await runPass(this.deps, batch, this.options);
    } finally {
      this.running = false;
    }
  }

  isRunning(): boolean {
    return this.running;
  }
}
