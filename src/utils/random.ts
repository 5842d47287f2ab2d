/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

export const pickIndex = (random: RandomSource, length: number): number => {
  if (length <= 0) return 0;
  const index = Math.floor(random() * length);
  return Math.min(length - 1, Math.max(0, index));
};
