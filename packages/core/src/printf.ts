/**
 * printf-style substitution over string arguments
 *
 * Arguments arrive as text lifted from the plugin line, so numeric
 * conversions read the leading number of each string and `%s` keeps the
 * text exactly as it was printed upstream.
 */

// Length modifiers (`%ld`, `%lf`) are accepted and ignored
const DIRECTIVE = /%([-+ 0#]*)(\*|\d+)?(?:\.(\*|\d*))?(?:hh|h|ll|l|L|q|j|z|t)?([%csdiufFeEgGxXob])/g;

const NUMERIC_PREFIX = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)/;
const NON_FINITE = /^\s*([-+]?)(nan|inf(?:inity)?)/i;

const RADIX: Record<string, number> = { u: 10, o: 8, x: 16, X: 16, b: 2 };

interface Directive {
  leftAlign: boolean;
  plus: boolean;
  space: boolean;
  zero: boolean;
  alternate: boolean;
  width: number;
  precision: number | undefined;
  conversion: string;
}

/**
 * Read the numeric value of an argument; `"12abc"` is 12, text without a
 * leading number is 0
 */
export function toNumber(arg: string | undefined): number {
  if (arg === undefined) {
    return 0;
  }

  const special = NON_FINITE.exec(arg);
  if (special) {
    if ((special[2] ?? "").toLowerCase() === "nan") {
      return Number.NaN;
    }
    return special[1] === "-" ? -Infinity : Infinity;
  }

  const match = NUMERIC_PREFIX.exec(arg);
  return match ? Number(match[1]) : 0;
}

function signOf(negative: boolean, d: Directive): string {
  if (negative) return "-";
  if (d.plus) return "+";
  if (d.space) return " ";
  return "";
}

/**
 * Apply field width; zero padding goes between sign/prefix and digits
 */
function pad(prefix: string, body: string, d: Directive, zeroAllowed: boolean): string {
  const length = prefix.length + body.length;
  if (length >= d.width) {
    return prefix + body;
  }

  const fill = d.width - length;
  if (d.leftAlign) {
    return prefix + body + " ".repeat(fill);
  }
  if (d.zero && zeroAllowed) {
    return prefix + "0".repeat(fill) + body;
  }
  return " ".repeat(fill) + prefix + body;
}

function formatNonFinite(value: number, d: Directive): string {
  const body = Number.isNaN(value) ? "NaN" : "Inf";
  return pad(signOf(value < 0, d), body, d, false);
}

/**
 * Split a finite non-negative double into `mantissa * 2 ** exponent`
 */
function decompose(abs: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, abs);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  if (biased === 0) {
    return { mantissa: fraction, exponent: -1074 };
  }
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * `abs * 10 ** scale` rounded to an integer, computed on the exact binary
 * value with ties going to the even neighbour, as C's printf rounds
 */
function roundScaled(abs: number, scale: number): bigint {
  const { mantissa, exponent } = decompose(abs);
  let numerator = mantissa;
  let denominator = 1n;

  if (exponent >= 0) {
    numerator <<= BigInt(exponent);
  } else {
    denominator <<= BigInt(-exponent);
  }
  if (scale >= 0) {
    numerator *= 10n ** BigInt(scale);
  } else {
    denominator *= 10n ** BigInt(-scale);
  }

  const quotient = numerator / denominator;
  const twice = (numerator % denominator) * 2n;
  if (twice > denominator || (twice === denominator && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

function toFixed(abs: number, precision: number): string {
  const digits = roundScaled(abs, precision).toString().padStart(precision + 1, "0");
  if (precision === 0) {
    return digits;
  }
  return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`;
}

/**
 * Significant digits and decimal exponent of `abs` rounded to
 * `precision + 1` digits
 */
function toScientific(abs: number, precision: number): { digits: string; exponent: number } {
  if (abs === 0) {
    return { digits: "0".repeat(precision + 1), exponent: 0 };
  }

  const lower = 10n ** BigInt(precision);
  const upper = lower * 10n;
  // log10 can be off by one near powers of ten
  let exponent = Math.floor(Math.log10(abs));
  let scaled = roundScaled(abs, precision - exponent);
  while (scaled >= upper || scaled < lower) {
    exponent += scaled >= upper ? 1 : -1;
    scaled = roundScaled(abs, precision - exponent);
  }

  return { digits: scaled.toString(), exponent };
}

/**
 * Exponent notation with at least two exponent digits, as C prints it
 */
function toExponential(abs: number, precision: number): string {
  const { digits, exponent } = toScientific(abs, precision);
  const mantissa = precision === 0 ? digits : `${digits.slice(0, 1)}.${digits.slice(1)}`;
  const sign = exponent < 0 ? "-" : "+";
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function stripTrailingZeros(text: string): string {
  const [mantissa = "", exponent] = text.split("e");
  const trimmed = mantissa.includes(".") ? mantissa.replace(/\.?0+$/, "") : mantissa;
  return exponent === undefined ? trimmed : `${trimmed}e${exponent}`;
}

function formatGeneral(abs: number, d: Directive): string {
  let precision = d.precision ?? 6;
  if (precision === 0) {
    precision = 1;
  }

  const { exponent } = toScientific(abs, precision - 1);

  const text =
    exponent < precision && exponent >= -4
      ? toFixed(abs, precision - 1 - exponent)
      : toExponential(abs, precision - 1);

  if (d.alternate) {
    return text.includes(".") ? text : text.replace(/(e|$)/, ".$1");
  }
  return stripTrailingZeros(text);
}

function formatFloat(value: number, d: Directive): string {
  if (!Number.isFinite(value)) {
    return formatNonFinite(value, d);
  }

  const negative = value < 0 || Object.is(value, -0);
  const abs = Math.abs(value);
  const precision = d.precision ?? 6;
  let body: string;

  switch (d.conversion.toLowerCase()) {
    case "f":
      body = toFixed(abs, precision);
      if (d.alternate && precision === 0) {
        body += ".";
      }
      break;
    case "e":
      body = toExponential(abs, precision);
      if (d.alternate && precision === 0) {
        body = body.replace("e", ".e");
      }
      break;
    default:
      body = formatGeneral(abs, d);
  }

  if (d.conversion === "E" || d.conversion === "G") {
    body = body.toUpperCase();
  }

  return pad(signOf(negative, d), body, d, true);
}

/**
 * Apply the minimum digit count given by precision
 */
function withPrecision(digits: string, precision: number | undefined): string {
  if (precision === undefined) {
    return digits;
  }
  if (precision === 0 && digits === "0") {
    return "";
  }
  return digits.padStart(precision, "0");
}

function formatSigned(value: number, d: Directive): string {
  if (!Number.isFinite(value)) {
    return formatNonFinite(value, d);
  }

  const truncated = BigInt(Math.trunc(value));
  const negative = truncated < 0n;
  const digits = withPrecision((negative ? -truncated : truncated).toString(), d.precision);
  return pad(signOf(negative, d), digits, d, d.precision === undefined);
}

function formatUnsigned(value: number, d: Directive): string {
  if (!Number.isFinite(value)) {
    return formatNonFinite(value, d);
  }

  const unsigned = BigInt.asUintN(64, BigInt(Math.trunc(value)));
  const radix = RADIX[d.conversion] ?? 10;
  let digits = withPrecision(unsigned.toString(radix), d.precision);
  let prefix = "";

  if (d.alternate && unsigned !== 0n) {
    if (d.conversion === "o") {
      digits = digits.startsWith("0") ? digits : `0${digits}`;
    } else if (d.conversion === "x" || d.conversion === "X") {
      prefix = "0x";
    } else if (d.conversion === "b") {
      prefix = "0b";
    }
  }

  const text = pad(prefix, digits, d, d.precision === undefined);
  return d.conversion === "X" ? text.toUpperCase() : text;
}

function formatString(arg: string | undefined, d: Directive): string {
  let text = arg ?? "";
  if (d.precision !== undefined) {
    text = text.slice(0, d.precision);
  }
  return pad("", text, d, false);
}

function formatChar(arg: string | undefined, d: Directive): string {
  const code = Math.trunc(toNumber(arg));
  const text = Number.isFinite(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : "";
  return pad("", text, d, false);
}

/**
 * Render `format` with the given arguments
 *
 * Supports `%s %c %d %i %u %f %F %e %E %g %G %x %X %o %b %%` with the
 * `- + space 0 #` flags, width, precision, `*` and C length modifiers.
 * Floats are rounded half to even on their exact binary value, at any
 * precision. Missing arguments render
 * as empty text or zero; surplus arguments are ignored. Anything that is
 * not a complete directive is copied through.
 */
export function sprintf(format: string, args: readonly string[]): string {
  let next = 0;
  const take = (): string | undefined => args[next++];

  return format.replace(
    DIRECTIVE,
    (_match, flags: string, width: string | undefined, precision: string | undefined, conversion: string) => {
      if (conversion === "%") {
        return "%";
      }

      const d: Directive = {
        leftAlign: flags.includes("-"),
        plus: flags.includes("+"),
        space: flags.includes(" "),
        zero: flags.includes("0"),
        alternate: flags.includes("#"),
        width: 0,
        precision: undefined,
        conversion,
      };

      if (width === "*") {
        const value = Math.trunc(toNumber(take()));
        if (value < 0) {
          d.leftAlign = true;
        }
        d.width = Math.abs(value);
      } else if (width !== undefined) {
        d.width = Number.parseInt(width, 10);
      }

      if (precision === "*") {
        const value = Math.trunc(toNumber(take()));
        d.precision = value < 0 ? undefined : value;
      } else if (precision !== undefined) {
        d.precision = precision === "" ? 0 : Number.parseInt(precision, 10);
      }

      const arg = take();
      switch (conversion) {
        case "s":
          return formatString(arg, d);
        case "c":
          return formatChar(arg, d);
        case "d":
        case "i":
          return formatSigned(toNumber(arg), d);
        case "u":
        case "o":
        case "x":
        case "X":
        case "b":
          return formatUnsigned(toNumber(arg), d);
        default:
          return formatFloat(toNumber(arg), d);
      }
    }
  );
}
