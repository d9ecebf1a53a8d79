import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("runner");

/**
 * Fire-and-forget executor for non-blocking tasks. Submitters get no handle
 * and cannot cancel; `idle` only exists so shutdown can let work finish.
 */
export interface BackgroundRunner {
  submit(label: string, work: () => Promise<void>): void;
  idle(): Promise<void>;
  pending(): number;
}

export function createBackgroundRunner(): BackgroundRunner {
  const inFlight = new Set<Promise<void>>();

  return {
    submit(label: string, work: () => Promise<void>): void {
      const job: Promise<void> = Promise.resolve()
        .then(work)
        .catch((err: unknown) => {
          log.error({ label, err }, "Background work failed");
        })
        .finally(() => {
          inFlight.delete(job);
        });
      inFlight.add(job);
      log.debug({ label, pending: inFlight.size }, "Background work submitted");
    },

    async idle(): Promise<void> {
      while (inFlight.size > 0) {
        await Promise.allSettled([...inFlight]);
      }
    },

    pending(): number {
      return inFlight.size;
    },
  };
}
