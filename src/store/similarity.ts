/** Euclidean norm, scaled by the largest component so squaring cannot overflow. */
export function norm(a: readonly number[]): number {
    let scale = 0;
    for (const x of a) scale = Math.max(scale, Math.abs(x));
    if (scale === 0) return 0;

    let sum = 0;
    for (const x of a) {
        const r = x / scale;
        sum += r * r;
    }
    return scale * Math.sqrt(sum);
}

/** Zero-norm vectors score 0 against everything. */
export function cosineSimilarity(
    a: readonly number[],
    b: readonly number[],
    normA = norm(a),
    normB = norm(b)
): number {
    if (normA === 0 || normB === 0) return 0;

    let sum = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) sum += (a[i] / normA) * (b[i] / normB);
    return sum;
}
