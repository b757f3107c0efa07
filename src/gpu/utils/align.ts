export function alignTo(value: number, alignment: number): number {
  if (alignment <= 0) return value;
  return Math.ceil(value / alignment) * alignment;
}

export function divCeil(value: number, divisor: number): number {
  return Math.floor((value + divisor - 1) / divisor);
}
