export type RoundingMode = 'down' | 'up';

/**
 * Computes how many coins a futures position can hold for a given USDT margin
 * and leverage.
 *
 * @param marginAmount USDT committed as margin (e.g. 100).
 * @param currentPrice Current price of one coin (e.g. 68000).
 * @param leverage Leverage to apply (e.g. 10, 20).
 * @param precision Decimal places kept in the result (default 6).
 * @returns The coin amount, or 0 when any input is not positive.
 */
export const calculateCoinAmountFromMargin = (
    marginAmount: number,
    currentPrice: number,
    leverage: number,
    precision: number = 6
): number => {
    if (currentPrice <= 0 || leverage <= 0 || marginAmount <= 0) {
        return 0;
    }

    // 100 USDT margin * 10x = 1000 USDT notional
    const totalPositionValueUSDT = marginAmount * leverage;

    // 1000 USDT / 68000 = 0.0147... BTC
    const rawCoinAmount = totalPositionValueUSDT / currentPrice;

    return parseFloat(rawCoinAmount.toFixed(precision));
};

/**
 * Quote currencies ordered longest first so that 'USDT' wins over 'USD'.
 */
const COMMON_QUOTE_CURRENCIES = [
    "FDUSD", "USDT", "USDC", "BUSD", "TUSD",
    "BTC", "ETH", "BNB", "DAI", "USD", "EUR"
];

/**
 * Turns 'BTCUSDT' into 'BTC/USDT'. Returns the input unchanged when no known
 * quote currency matches.
 */
export const formatPair = (pair: string): string => {
    if (!pair) {
        return "";
    }

    const upper = pair.toUpperCase().replace(/[-_]/g, "");
    for (const quote of COMMON_QUOTE_CURRENCIES) {
        if (upper.endsWith(quote) && upper.length > quote.length) {
            const base = upper.substring(0, upper.length - quote.length);
            return `${base}/${quote}`;
        }
    }

    return pair;
};

/**
 * Unified perpetual symbol for a USDT-margined swap: 'BTCUSDT' → 'BTC/USDT:USDT'.
 * Symbols already in unified form pass through.
 */
export const toPerpetualSymbol = (pair: string): string => {
    if (pair.includes(":")) {
        return pair;
    }
    const spot = pair.includes("/") ? pair.toUpperCase() : formatPair(pair);
    const slash = spot.indexOf("/");
    if (slash < 0) {
        return spot;
    }
    return `${spot}:${spot.substring(slash + 1)}`;
};

/** Number of decimals carried by an increment such as 0.001 or 1e-7. */
export const decimalsOf = (step: number): number => {
    if (!Number.isFinite(step) || step <= 0) {
        return 0;
    }
    const text = step.toString();
    const exponent = text.match(/e-(\d+)$/);
    if (exponent) {
        const mantissa = text.split("e")[0];
        const mantissaDecimals = mantissa.includes(".") ? mantissa.split(".")[1].length : 0;
        return parseInt(exponent[1], 10) + mantissaDecimals;
    }
    return text.includes(".") ? text.split(".")[1].length : 0;
};

/**
 * Snaps a value onto the grid of an exchange increment (tick size or lot step).
 * The small epsilon keeps values that are already on the grid from slipping a
 * full step because of binary floating point.
 */
export const roundToStep = (value: number, step: number, mode: RoundingMode = 'down'): number => {
    if (!Number.isFinite(step) || step <= 0) {
        return value;
    }
    const units = value / step;
    const snapped = mode === 'down' ? Math.floor(units + 1e-9) : Math.ceil(units - 1e-9);
    return parseFloat((snapped * step).toFixed(decimalsOf(step)));
};
