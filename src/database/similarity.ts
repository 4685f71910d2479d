export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function compareScored(a: { id: number; score: number }, b: { id: number; score: number }): number {
    const diff = b.score - a.score;
    if (diff !== 0) {
        return diff;
    }
    return a.id - b.id;
}
