import { IndexBackend } from "../domain/types.js";

export const INSUFFICIENT_INFORMATION =
  "The document does not contain sufficient information to answer this question";

const EXPLANATION_EXCERPT_CHARS = 500;

export function buildAnswerPrompt(question: string, contextChunks: readonly string[]): string {
  const context = contextChunks
    .map((chunk, index) => `Chunk ${index + 1}:\n${chunk}`)
    .join("\n\n");

  return [
    "Based on the following document excerpts, provide a comprehensive answer to the question.",
    "",
    "DOCUMENT EXCERPTS:",
    context,
    "",
    `QUESTION: ${question}`,
    "",
    "Instructions:",
    "1. Provide a direct, accurate answer based only on the information in the document excerpts",
    `2. If the answer is not clearly found in the excerpts, state "${INSUFFICIENT_INFORMATION}"`,
    "3. Cite specific parts of the document that support your answer",
    "4. Be concise but thorough",
    "",
    "ANSWER:",
  ].join("\n");
}

export function buildExplanationPrompt(question: string, chunk: string): string {
  const excerpt =
    chunk.length > EXPLANATION_EXCERPT_CHARS
      ? `${chunk.slice(0, EXPLANATION_EXCERPT_CHARS)}...`
      : chunk;

  return [
    `Explain in 1-2 sentences why this document excerpt is relevant to the question: "${question}"`,
    "",
    "Document excerpt:",
    excerpt,
    "",
    "Keep the explanation concise and specific.",
  ].join("\n");
}

export function formatExplanation(score: number, explanation: string): string {
  return `Relevance score: ${score.toFixed(3)} - ${explanation.trim()}`;
}

export function formatFallbackExplanation(score: number): string {
  return `Semantic similarity score: ${score.toFixed(3)} - This section contains content related to your query.`;
}

export function buildDecisionRationale(details: {
  generator: string;
  contextCount: number;
  matchCount: number;
  backend: IndexBackend;
}): string {
  if (details.matchCount === 0) {
    return `No document sections were retrieved from the ${details.backend} index; the answer was not generated.`;
  }
  return `Answer generated using ${details.generator.toUpperCase()} based on ${details.contextCount} most relevant document sections (of ${details.matchCount} retrieved) through semantic vector search on the ${details.backend} index.`;
}

export function buildFailureRationale(stage: string, message: string): string {
  return `Answer could not be produced: ${stage} failed (${message}).`;
}
