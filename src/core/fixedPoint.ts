// core/fixedPoint.ts: 1e18 / 1e36 BigInt fixed-point arithmetic (zero floating point)

/**
 * Scale of every price, factor and exchange rate mantissa
 */
export const EXP_SCALE = 10n ** 18n;

/**
 * Scale of reward indices
 */
export const DOUBLE_SCALE = 10n ** 36n;

/**
 * 1.0 as an 18-decimal mantissa
 */
export const MANTISSA_ONE = EXP_SCALE;

/**
 * Largest unsigned 256-bit value; used as the "no cap" sentinel
 */
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Largest storable reward index
 */
export const MAX_UINT224 = (1n << 224n) - 1n;

// a × b, both 1e18-scaled
export function mulExp(a: bigint, b: bigint): bigint {
  return (a * b) / EXP_SCALE;
}

// a / b, both 1e18-scaled; caller guarantees b > 0
export function divExp(a: bigint, b: bigint): bigint {
  return (a * EXP_SCALE) / b;
}

/**
 * Multiply an unsigned scalar by a 1e18 mantissa, truncating toward zero
 */
export function mulScalarTruncate(mantissa: bigint, scalar: bigint): bigint {
  return (mantissa * scalar) / EXP_SCALE;
}

/**
 * mulScalarTruncate(mantissa, scalar) + addend
 */
export function mulScalarTruncateAdd(mantissa: bigint, scalar: bigint, addend: bigint): bigint {
  return mulScalarTruncate(mantissa, scalar) + addend;
}

/**
 * Scalar divided by a 1e18 mantissa (e.g. debt / borrowIndex → principal)
 */
export function divScalarByExp(scalar: bigint, mantissa: bigint): bigint {
  return (scalar * EXP_SCALE) / mantissa;
}

/**
 * a / b as a 1e36-scaled ratio; 0 when b is 0
 */
export function fraction(a: bigint, b: bigint): bigint {
  if (b === 0n) return 0n;
  return (a * DOUBLE_SCALE) / b;
}

/**
 * Scalar multiplied by a 1e36 ratio
 */
export function mulDouble(scalar: bigint, ratio: bigint): bigint {
  return (scalar * ratio) / DOUBLE_SCALE;
}

/**
 * Subtraction clamped at zero
 */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}
