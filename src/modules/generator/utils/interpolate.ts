// alpha is not clamped
export function interpolate(x: number, y: number, alpha: number): number {
  return x * (1 - alpha) + alpha * y;
}
