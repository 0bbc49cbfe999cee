/**
 * Sampler module types
 */

export const SAMPLING_STRATEGIES = ["random", "firstN"] as const;

export type SamplingStrategyName = (typeof SAMPLING_STRATEGIES)[number];

export function isSamplingStrategyName(value: unknown): value is SamplingStrategyName {
  return SAMPLING_STRATEGIES.some((name) => name === value);
}

export interface MongoConnection {
  uri: string;
  database: string;
}
