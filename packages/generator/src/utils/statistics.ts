/**
 * Small descriptive statistics helpers.
 */

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Pearson correlation coefficient of two equal-length series.
 * Returns 0 when either series has no variance or fewer than two points.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
    const n = Math.min(xs.length, ys.length);
    if (n < 2) return 0;

    const meanX = mean(xs.slice(0, n));
    const meanY = mean(ys.slice(0, n));

    let covariance = 0;
    let varianceX = 0;
    let varianceY = 0;
    for (let i = 0; i < n; i++) {
        const dx = (xs[i] ?? 0) - meanX;
        const dy = (ys[i] ?? 0) - meanY;
        covariance += dx * dy;
        varianceX += dx * dx;
        varianceY += dy * dy;
    }

    if (varianceX === 0 || varianceY === 0) return 0;
    return covariance / Math.sqrt(varianceX * varianceY);
}

/**
 * Correlation of a series against its own position (0, 1, 2, ...).
 */
export function positionCorrelation(values: readonly number[]): number {
    return pearson(
        values.map((_, i) => i),
        values
    );
}

export function summarize(values: readonly number[]): { min: number; max: number; mean: number } {
    if (values.length === 0) {
        return { min: 0, max: 0, mean: 0 };
    }
    return {
        min: Math.min(...values),
        max: Math.max(...values),
        mean: mean(values),
    };
}
