import { SOURCE_KIND_PRIORITY, type Observation, type SourceFamily } from "../types/contracts.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import type { SourceAdapter } from "./sources/types.js";

export type FallbackChainOptions = {
  families: readonly SourceFamily[];
  adapters: readonly SourceAdapter[];
  logger?: Logger;
};

/**
 * Walks each family's adapters from the most to the least trusted kind and
 * keeps the first observation. Families run independently; the output keeps
 * the configured family order.
 */
export class FallbackChain {
  readonly families: readonly SourceFamily[];

  private readonly chains: ReadonlyMap<SourceFamily, readonly SourceAdapter[]>;
  private readonly log: Logger;

  constructor(options: FallbackChainOptions) {
    this.families = dedupe(options.families);
    this.log = options.logger ?? createChildLogger({ component: "fallback-chain" });

    const chains = new Map<SourceFamily, SourceAdapter[]>();
    for (const family of this.families) {
      chains.set(
        family,
        options.adapters
          .filter((adapter) => adapter.family === family)
          .sort((left, right) => SOURCE_KIND_PRIORITY.indexOf(left.kind) - SOURCE_KIND_PRIORITY.indexOf(right.kind))
      );
    }
    this.chains = chains;
  }

  adaptersFor(family: SourceFamily): readonly SourceAdapter[] {
    return this.chains.get(family) ?? [];
  }

  async collect(query: string): Promise<Observation[]> {
    const perFamily = await Promise.all(this.families.map((family) => this.resolveFamily(family, query)));
    return perFamily.filter((observation): observation is Observation => observation !== null);
  }

  private async resolveFamily(family: SourceFamily, query: string): Promise<Observation | null> {
    for (const adapter of this.adaptersFor(family)) {
      let observation: Observation | null;
      try {
        observation = await adapter.fetch(query);
      } catch (error) {
        this.log.error({
          msg: "Source adapter failed",
          source: adapter.id,
          query,
          error: error instanceof Error ? error.message : String(error)
        });
        continue;
      }

      if (observation) {
        this.log.debug({ msg: "Source answered", source: adapter.id, query, price: observation.price });
        return observation;
      }
    }

    this.log.info({ msg: "No source answered for family", family, query });
    return null;
  }
}

function dedupe(families: readonly SourceFamily[]): SourceFamily[] {
  return Array.from(new Set(families));
}
