// Minor-unit exponents for currencies that do not use cents. Everything else is 2.
const CURRENCY_EXPONENT: Record<string, number> = {
    JPY: 0, KRW: 0, VND: 0, CLP: 0, ISK: 0, PYG: 0, UGX: 0,
    BHD: 3, KWD: 3, OMR: 3, JOD: 3, TND: 3, LYD: 3, IQD: 3,
};

export function currencyExponent(currency: string | null): number {
    if (!currency) return 2;
    return CURRENCY_EXPONENT[currency.trim().toUpperCase()] ?? 2;
}

/** Round to the smallest unit of the currency, as an integer count of that unit. */
export function toMinorUnits(amount: number, currency: string | null): number {
    const factor = 10 ** currencyExponent(currency);
    // toFixed(6) absorbs binary drift such as 1.005 * 100 = 100.49999999999999
    // while keeping every integer digit of large amounts
    return Math.round(Number((amount * factor).toFixed(6)));
}

export function roundMoney(amount: number, currency: string | null): number {
    const factor = 10 ** currencyExponent(currency);
    return toMinorUnits(amount, currency) / factor;
}

export function sumMoney(amounts: number[], currency: string | null): number {
    const factor = 10 ** currencyExponent(currency);
    return amounts.reduce((acc, a) => acc + toMinorUnits(a, currency), 0) / factor;
}
