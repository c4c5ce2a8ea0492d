import { NO_CONTEXT_SENTINEL } from '../../common/constants/context.constants';

export const SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions based on the provided context.';

export function hasUsableContext(context: string): boolean {
  const trimmed = context.trim();
  return trimmed.length > 0 && trimmed !== NO_CONTEXT_SENTINEL;
}

export function buildPrompt(message: string, context: string): string {
  if (hasUsableContext(context)) {
    return `Based on the following context, please answer the user's question:

Context:
${context}

User Question: ${message}

Please provide a helpful and accurate answer based on the context provided. If the context doesn't contain enough information to answer the question, please say so.`;
  }

  return `User Question: ${message}

Please provide a helpful answer. Note that no specific context documents were found for this question.`;
}
