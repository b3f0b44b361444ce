export function buildEvaluationPrompt(guideContent: string, answerText: string): string {
  return `You are an examiner for 12th grade answer sheets.
The student has written an answer for a 5-mark question.
Your task is to carefully evaluate the answer text and return ONLY the marks (0 to 5) with brief reasoning.

Rules:
- Be fair and follow a 12th grade standard marking scheme.
- Check grammar, content accuracy, relevance, and completeness.
- Use the provided reference guide to verify correctness of concepts and facts.
- Award marks based on how well the answer aligns with the reference material.
- Give the score as a whole number from 0 to 5.
- Do not rewrite or improve the answer.
- Keep the evaluation short and clear.

Reference Guide Content:
${guideContent}

Format your output strictly as a single JSON object:
{
  "score": <marks out of 5>,
  "reason": "<one short reason why you gave this score>"
}

Student's answer:
"""${answerText}"""
`;
}
