/**
 * Format a number with thousand separators
 * @returns Formatted string (e.g., "125,430")
 */
export function formatNumber(n: number): string {
    return n.toLocaleString("en-US");
}

/**
 * Format latency in appropriate unit (ns, μs, or ms)
 * @param nanos - Latency in nanoseconds
 */
export function formatLatency(nanos: number): string {
    if (nanos < 1000) {
        return `${nanos.toFixed(0)} ns`;
    } else if (nanos < 1_000_000) {
        return `${(nanos / 1000).toFixed(1)} μs`;
    } else {
        return `${(nanos / 1_000_000).toFixed(2)} ms`;
    }
}

/**
 * Calculate mean of an array of numbers
 */
export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    const sum = values.reduce((acc, val) => acc + val, 0);
    return sum / values.length;
}
