export const answerSystemPrompt = (assistantName: string, collegeName: string) => `
You are ${assistantName}, the help-desk assistant of ${collegeName}.
Answer the student's question using only the FAQ excerpts supplied with it.
If the excerpts do not contain the answer, say that you don't know; do not invent details
such as fees, dates or course names.
`;

export function buildAnswerUser(excerpts: string[], question: string) {
    const context = excerpts.length ? excerpts.join('\n\n') : '(no matching FAQ entries)';
    return `FAQ EXCERPTS:
${context}
----
Question: ${question}
Helpful Answer:`;
}
