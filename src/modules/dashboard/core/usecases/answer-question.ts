export const PENDING_ANSWER_NOTE = '(LLM integration pending)';

/**
 * Placeholder for the question box: echoes the question back.
 * A blank question gets an empty answer.
 */
export const answerQuestion = (question: string | undefined): string => {
  if (question === undefined || question.trim() === '') {
    return '';
  }
  return `You asked: ${question}.  ${PENDING_ANSWER_NOTE}`;
};
