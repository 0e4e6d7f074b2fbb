export function l2Normalize(values: ArrayLike<number>): Float32Array {
  const normalized = Float32Array.from(values);
  let sumSquares = 0;
  for (let i = 0; i < normalized.length; i += 1) {
    sumSquares += normalized[i] * normalized[i];
  }
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return normalized;
  }
  for (let i = 0; i < normalized.length; i += 1) {
    normalized[i] /= norm;
  }
  return normalized;
}

export function dotProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}
