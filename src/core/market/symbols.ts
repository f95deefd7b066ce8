// Exchange symbols -> canonical coin code.
//   Bybit:   BTCUSDT      -> BTC
//   CoinDCX: B-BTC_USDT   -> BTC, F-ETH_USDT -> ETH, BM-SOL_USD -> SOL

const DERIVATIVE_PREFIXES = ['BM-', 'B-', 'F-'];
const QUOTE_SUFFIXES = ['USDT', 'USDC'];

export function normalizeSymbol(symbol: string): string {
    return symbol.trim().toUpperCase();
}

export function toCanonicalInstrument(symbol: string): string | undefined {
    let value = normalizeSymbol(symbol);
    if (!value) return undefined;

    for (const prefix of DERIVATIVE_PREFIXES) {
        if (value.startsWith(prefix)) {
            value = value.slice(prefix.length);
            break;
        }
    }

    const underscore = value.indexOf('_');
    if (underscore >= 0) {
        value = value.slice(0, underscore);
    } else {
        for (const suffix of QUOTE_SUFFIXES) {
            if (value.length > suffix.length && value.endsWith(suffix)) {
                value = value.slice(0, -suffix.length);
                break;
            }
        }
    }

    return value || undefined;
}

export function normalizeSymbolList(symbols: readonly string[]): string[] {
    const unique = new Set<string>();
    for (const symbol of symbols) {
        const normalized = normalizeSymbol(symbol);
        if (normalized) unique.add(normalized);
    }
    return Array.from(unique);
}
