/**
 * The plain decimal text of a number, e.g. `"0.1"` or `"-1200"`: the shortest text that
 * round-trips to the parsed value, with exponent notation expanded. Only {@link toDecimal}
 * produces it; numeric bounds are handed out as text so consumers never see binary floating
 * point drift.
 */
export type Decimal = string;

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a numeric bound into its plain decimal text.
 * Returns `undefined` for anything that is not a finite number or a decimal literal.
 */
export function toDecimal(value: unknown): Decimal | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? expandExponent(String(value)) : undefined;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return DECIMAL_LITERAL.test(trimmed) ? expandExponent(trimmed) : undefined;
    }
    return undefined;
}

function expandExponent(literal: string): Decimal {
    const match = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(literal);
    if (!match) return literal;

    const [, sign, intPart, fracPart = '', exponentText] = match;
    const exponent = exponentText ? Number(exponentText) : 0;

    let digits = `${intPart}${fracPart}`;
    let pointIndex = intPart.length + exponent;

    if (pointIndex < 0) {
        digits = '0'.repeat(-pointIndex) + digits;
        pointIndex = 0;
    } else if (pointIndex > digits.length) {
        digits = digits + '0'.repeat(pointIndex - digits.length);
    }

    const whole = digits.slice(0, pointIndex).replace(/^0+(?=\d)/, '') || '0';
    const fraction = digits.slice(pointIndex).replace(/0+$/, '');
    const unsigned = fraction ? `${whole}.${fraction}` : whole;

    return sign === '-' && /[1-9]/.test(unsigned) ? `-${unsigned}` : unsigned;
}
