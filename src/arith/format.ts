/**
 * Purpose: Render arithmetic results for display after `=`.
 * Intent: Match calculator conventions: ten fractional digits trimmed, grouped integers, two-decimal currency.
 */

export function addThousandsSeparators(digits: string): string {
  const neg = digits.startsWith("-");
  const body = neg ? digits.slice(1) : digits;
  let out = "";
  for (let i = 0; i < body.length; i++) {
    if (i > 0 && (body.length - i) % 3 === 0) out += ",";
    out += body[i] ?? "";
  }
  return neg ? `-${out}` : out;
}

// toFixed switches to exponent notation at 1e21.
function fixedDigits(abs: number, fractionDigits: number): string {
  if (abs >= 1e21) return BigInt(abs).toString();
  return abs.toFixed(fractionDigits);
}

function formatPlain(value: number): string {
  let s = fixedDigits(Math.abs(value), 10);
  if (s.includes(".")) s = s.replace(/0+$/, "").replace(/\.$/, "");
  const dot = s.indexOf(".");
  const intPart = dot === -1 ? s : s.slice(0, dot);
  const fracPart = dot === -1 ? "" : s.slice(dot);
  const body = addThousandsSeparators(intPart) + fracPart;
  return value < 0 && body !== "0" ? `-${body}` : body;
}

function formatCurrency(value: number): string {
  const abs = Math.abs(value);
  let whole = Math.trunc(abs);
  let cents = Math.round((abs - whole) * 100);
  if (cents === 100) {
    whole += 1;
    cents = 0;
  }
  const sign = value < 0 ? "-" : "";
  return `$${sign}${addThousandsSeparators(fixedDigits(whole, 0))}.${String(cents).padStart(2, "0")}`;
}

export function formatResult(value: number, isCurrency: boolean): string {
  if (!Number.isFinite(value)) return "NaN";
  return isCurrency ? formatCurrency(value) : formatPlain(value);
}

export function formatBoolean(value: number): string {
  return value === 1 ? "true" : "false";
}
