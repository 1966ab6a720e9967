/**
 * Fixed-point formatting that settles exact ties on the even digit
 * (0.125 -> "0.12", 0.375 -> "0.38"). `toFixed` alone always rounds ties up.
 */
export function toFixedHalfEven(x: number, digits: number): string {
  const fixed = x.toFixed(digits);

  // A tie has a short exact expansion, so 100 digits shows it in full.
  const frac = Math.abs(x).toFixed(100).split(".")[1] ?? "";
  if (!/^50*$/.test(frac.slice(digits))) return fixed;

  if (Number(fixed[fixed.length - 1]) % 2 === 0) return fixed;

  // toFixed went away from zero; step one unit back toward it.
  const back = Math.abs(Number(fixed)) - 10 ** -digits;
  return (Math.sign(x) * back).toFixed(digits);
}

export function roundHalfEven(x: number, digits: number): number {
  return Number(toFixedHalfEven(x, digits));
}
