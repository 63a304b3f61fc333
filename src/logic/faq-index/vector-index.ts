export interface SearchHit {
    text: string;
    score: number;
    position: number;   // position of the document in the source list
}

export interface Retriever {
    retrieve(query: string): Promise<string[]>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) return 0;
    let dot = 0, magA = 0, magB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        magA += a[i] * a[i];
        magB += b[i] * b[i];
    }
    const denom = Math.sqrt(magA) * Math.sqrt(magB);
    return denom === 0 ? 0 : dot / denom;
}

/** Brute-force cosine search; the FAQ is a few hundred rows at most. */
export class VectorIndex {
    private constructor(private readonly entries: { text: string; embedding: number[] }[]) { }

    static fromEmbeddings(texts: string[], embeddings: number[][]): VectorIndex {
        if (texts.length !== embeddings.length) {
            throw new Error(`Cannot index ${texts.length} documents with ${embeddings.length} embeddings`);
        }
        return new VectorIndex(texts.map((text, i) => ({ text, embedding: embeddings[i] })));
    }

    get size(): number {
        return this.entries.length;
    }

    search(vector: number[], k: number): SearchHit[] {
        return this.entries
            .map((entry, position) => ({ text: entry.text, score: cosineSimilarity(vector, entry.embedding), position }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, Math.max(0, k));
    }
}
