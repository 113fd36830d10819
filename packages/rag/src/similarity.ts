const dot = (a: readonly number[], b: readonly number[]): number =>
  a.reduce((sum, val, i) => sum + val * (b[i] ?? 0), 0);
const magnitude = (a: readonly number[]): number => Math.sqrt(dot(a, a));

export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  const denom = magnitude(a) * magnitude(b);
  if (denom === 0) return 0;
  return dot(a, b) / denom;
};
