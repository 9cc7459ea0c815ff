import type { Observation, SourceFamily, SourceKind } from "../../types/contracts.js";

export interface SourceAdapter {
  readonly id: string;
  readonly family: SourceFamily;
  readonly kind: SourceKind;
  fetch(query: string): Promise<Observation | null>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
