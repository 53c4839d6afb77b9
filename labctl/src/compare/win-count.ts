import { classifyDirection, isBetter, type DirectionOverrides } from "./direction.js";

export type Contender = {
  name: string;
  metrics: Record<string, number>;
};

/**
 * Win count per contender: the number of metrics on which it is strictly better
 * than every other contender reporting that metric. A metric reported by fewer
 * than two contenders is not contested; ties award no win to anyone.
 */
export function computeWinCounts(
  contenders: Contender[],
  metrics: string[],
  directions: DirectionOverrides = {},
): Map<string, number> {
  const counts = new Map<string, number>(contenders.map((c) => [c.name, 0]));

  for (const metric of metrics) {
    const direction = classifyDirection(metric, directions);
    const holders = contenders.filter((c) => Number.isFinite(c.metrics[metric]));
    if (holders.length < 2) continue;

    for (const holder of holders) {
      const value = holder.metrics[metric];
      const beatsAll = holders.every((other) => other === holder || isBetter(value, other.metrics[metric], direction));
      if (beatsAll) counts.set(holder.name, (counts.get(holder.name) ?? 0) + 1);
    }
  }

  return counts;
}
