/**
 * IEEE 754 binary16 to a JS number. Every bit pattern maps to some value: subnormals,
 * signed zero, infinities and NaN included.
 */
export function float16FromBits(bits: number): number {
  const sign = (bits & 0x8000) !== 0 ? -1 : 1;
  const exp = (bits >>> 10) & 0x1f;
  const frac = bits & 0x3ff;
  if (exp === 0) return sign * Math.pow(2, -14) * (frac / 1024);
  if (exp === 0x1f) return frac !== 0 ? Number.NaN : sign * Number.POSITIVE_INFINITY;
  return sign * Math.pow(2, exp - 15) * (1 + frac / 1024);
}
